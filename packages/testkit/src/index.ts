export { createTempDir, removeDir, withTempDir, writeFixture } from "./fs.js";
export { createMemoryIo, parseJsonOutput, type MemoryIo } from "./cli.js";
export { fixturePath } from "./fixtures.js";
