/**
 * Abstraction for persisting a downloaded body.
 */
export interface WrittenFile {
  filename: string;
  path: string;
  bytesWritten: number;
}

export interface FileWriter {
  /** Write `body` under the name derived from `url`, replacing any existing file */
  write(directory: string, url: string, body: Uint8Array): Promise<WrittenFile>;
}
