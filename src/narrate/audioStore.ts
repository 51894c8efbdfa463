import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface AudioStore {
  /** Persists the narration and returns its reference relative to the data directory. */
  save(id: string, audio: Uint8Array): Promise<string>;
}

const toFileStem = (id: string): string => id.replace(/[^A-Za-z0-9._-]/g, "_");

export const createFileAudioStore = (options: { dataDir: string; audioDir: string }): AudioStore => ({
  async save(id, audio) {
    const fileName = `${toFileStem(id)}.mp3`;
    const directory = join(options.dataDir, options.audioDir);
    const filePath = join(directory, fileName);
    const tempPath = `${filePath}.${process.pid}.tmp`;

    await mkdir(directory, { recursive: true });
    await writeFile(tempPath, audio);
    await rename(tempPath, filePath);

    return `${options.audioDir}/${fileName}`;
  },
});
