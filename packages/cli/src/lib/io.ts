/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";

/**
 * Streams the CLI reads from and writes to; tests substitute buffers
 */
export interface CliIo {
  /** Whether error output may use ANSI colors */
  readonly colors: boolean;
  writeOut(text: string): void;
  writeErr(text: string): void;
  readStdin(): Promise<string>;
  readFile(path: string): Promise<string>;
  stdinIsTTY(): boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * The process's real streams
 */
export const processIo: CliIo = {
  colors: process.stderr.isTTY ?? false,
  writeOut: (text) => {
    process.stdout.write(text);
  },
  writeErr: (text) => {
    process.stderr.write(text);
  },
  readStdin: () => readStdin(),
  readFile: (path) => fs.readFile(path, "utf8"),
  stdinIsTTY: () => process.stdin.isTTY ?? false,
};
