import { experimental_generateSpeech as generateSpeech } from "ai";

type SpeechModel = Parameters<typeof generateSpeech>[0]["model"];

export type SynthesisRequest = {
  text: string;
  /** BCP-47 tag such as `zh-TW`. */
  language: string;
};

export interface SpeechSynthesizer {
  synthesize(request: SynthesisRequest): Promise<Uint8Array>;
}

export const toIso639 = (language: string): string => (language.split("-")[0] ?? language).toLowerCase();

export const createAiSynthesizer = (options: {
  model: SpeechModel;
  voice: string;
  timeoutMs: number;
}): SpeechSynthesizer => ({
  async synthesize({ text, language }) {
    const { audio } = await generateSpeech({
      model: options.model,
      text,
      voice: options.voice,
      language: toIso639(language),
      outputFormat: "mp3",
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(options.timeoutMs),
    });

    return audio.uint8Array;
  },
});
