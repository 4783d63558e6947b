/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "gdfind-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "gdfind-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a file into a directory
 * @param dir - Target directory
 * @param name - File name
 * @param content - Text, or a value serialized as JSON
 * @returns Absolute path of the written file
 */
export async function writeFixture(dir: string, name: string, content: unknown): Promise<string> {
  const filePath = join(dir, name);
  const text = typeof content === "string" ? content : JSON.stringify(content, null, 2) + "\n";
  await writeFile(filePath, text, "utf8");
  return filePath;
}
