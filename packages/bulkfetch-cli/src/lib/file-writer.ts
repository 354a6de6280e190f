import { writeFile } from "fs/promises";
import { join } from "path";
import type { FileWriter, WrittenFile } from "./ports/file-writer.js";
import { errorMessage, FileWriteError } from "./errors/types.js";

/**
 * Name a download after the text following the last "/" of its URL.
 * Query strings stay part of the name; two URLs ending in the same
 * segment write to the same file and the last one wins.
 */
export function deriveFilename(url: string): string {
  return url.slice(url.lastIndexOf("/") + 1);
}

/**
 * Writes bodies with a plain truncate-and-write.
 */
export const fsFileWriter: FileWriter = {
  async write(directory: string, url: string, body: Uint8Array): Promise<WrittenFile> {
    const filename = deriveFilename(url);
    const path = join(directory, filename);

    if (filename === "" || filename === "." || filename === "..") {
      throw new FileWriteError(path, `URL has no usable final path segment: ${url}`);
    }

    try {
      await writeFile(path, body);
    } catch (error) {
      throw new FileWriteError(path, `Cannot write ${path}: ${errorMessage(error)}`, error);
    }

    return { filename, path, bytesWritten: body.byteLength };
  },
};
