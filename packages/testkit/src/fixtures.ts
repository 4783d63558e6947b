/**
 * Shared dataset fixtures
 */

import { fileURLToPath } from "node:url";

/**
 * Absolute path of a file under testkit/fixtures
 * @example fixturePath("dataset.json")
 */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}
