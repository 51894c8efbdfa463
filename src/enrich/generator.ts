import { APICallError, generateText, type LanguageModel, Output } from "ai";
import { generationSchema } from "../core/enrichment";

export type GenerationRequest = {
  system: string;
  prompt: string;
};

export interface StructuredGenerator {
  /** Returns the model's object as-is; validation happens in the caller. */
  generate(request: GenerationRequest): Promise<unknown>;
}

export const isRetryableServiceError = (error: unknown): boolean =>
  APICallError.isInstance(error) ? error.isRetryable : true;

export const createAiGenerator = (options: { model: LanguageModel; timeoutMs: number }): StructuredGenerator => ({
  async generate({ system, prompt }) {
    const { output } = await generateText({
      model: options.model,
      output: Output.object({ schema: generationSchema }),
      system,
      prompt,
      temperature: 0.7,
      maxOutputTokens: 2000,
      // retries are owned by the enrichment retry policy
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(options.timeoutMs),
    });

    return output;
  },
});
