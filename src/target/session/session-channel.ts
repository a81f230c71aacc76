/**
 * Session Channel contract
 *
 * A bidirectional text stream to the target. `send` never waits; `expect`
 * resolves with the index of the first pattern seen in arrival order, or
 * TIMEOUT once the deadline passes.
 */

export const TIMEOUT: unique symbol = Symbol('session.timeout');

export type Pattern = string | RegExp;

export type ExpectMatch = number | typeof TIMEOUT;

export interface SessionChannel {
  send(line: string): void;
  expect(patterns: readonly Pattern[], timeoutMs?: number): Promise<ExpectMatch>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
}

/** One-shot command execution on the target (a fresh shell per command) */
export interface CommandRunner {
  run(command: string, options?: RunOptions): Promise<CommandResult>;
}
