/**
 * Output channels for the CLI
 */

/**
 * Where the CLI writes; tests substitute an in-memory implementation
 */
export interface CliIo {
  /** Write to standard output */
  out(text: string): void;
  /** Write to standard error */
  err(text: string): void;
  /** Whether standard error is an interactive terminal */
  isErrTTY: boolean;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Channels backed by the process streams
 */
export function createProcessIo(): CliIo {
  return {
    out: writeStdout,
    err: writeStderr,
    isErrTTY: process.stderr.isTTY ?? false,
  };
}
