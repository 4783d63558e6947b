/**
 * CLI testing utilities
 */

/**
 * In-memory output channels with the shape the CLI writes through
 */
export interface MemoryIo {
  out: (text: string) => void;
  err: (text: string) => void;
  isErrTTY: boolean;
  /** Everything written to stdout so far */
  stdout(): string;
  /** Everything written to stderr so far */
  stderr(): string;
}

/**
 * Create output channels that collect everything written to them
 * @param options - Set isErrTTY to exercise terminal-only output
 */
export function createMemoryIo(options: { isErrTTY?: boolean } = {}): MemoryIo {
  let stdout = "";
  let stderr = "";

  return {
    out: (text) => {
      stdout += text;
    },
    err: (text) => {
      stderr += text;
    },
    isErrTTY: options.isErrTTY ?? false,
    stdout: () => stdout,
    stderr: () => stderr,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
