/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { parseJson } from "./arg.js";

/**
 * Streams and prompts a command may use; swapped out in tests
 */
export interface CliIO {
  stdout(content: string): void;
  stderr(content: string): void;
  readStdin(): Promise<Buffer>;
  stdinIsTTY(): boolean;
  confirm(question: string): Promise<boolean>;
  colors: boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let bytesRead = 0;

    process.stdin.on("data", (chunk: Buffer) => {
      bytesRead += chunk.length;

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      chunks.push(chunk);
    });

    process.stdin.on("end", () => resolve(Buffer.concat(chunks)));
    process.stdin.on("error", reject);
  });
}

/**
 * Read a payload file as bytes
 */
export async function readFileBytes(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}

/**
 * Ask a yes/no question on stderr
 */
async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} (y/N) `);
    return answer.trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Process-backed I/O
 */
export const processIO: CliIO = {
  stdout: (content) => process.stdout.write(content),
  stderr: writeStderr,
  readStdin: () => readStdin(),
  stdinIsTTY: () => process.stdin.isTTY ?? false,
  confirm,
  colors: process.stderr.isTTY ?? false,
};
