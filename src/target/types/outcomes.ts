/**
 * Outcome vocabularies for kmod load and unload.
 *
 * The position of each outcome is the index of its pattern in the list handed
 * to the session matcher. Load and unload keep separate enumerations even
 * though both put their third outcome at index 2.
 */

export const LOAD_OUTCOMES = ['OK', 'FAULT', 'DUPLICATE'] as const;

export const UNLOAD_OUTCOMES = ['OK', 'FAULT', 'BUSY'] as const;

/** Reported when no expected pattern appeared before the deadline */
export const TIMEOUT_OUTCOME = 'TIMEOUT';

export type ClassifiedLoadOutcome = (typeof LOAD_OUTCOMES)[number];

export type ClassifiedUnloadOutcome = (typeof UNLOAD_OUTCOMES)[number];

export type LoadOutcome = ClassifiedLoadOutcome | typeof TIMEOUT_OUTCOME;

export type UnloadOutcome = ClassifiedUnloadOutcome | typeof TIMEOUT_OUTCOME;

export interface ExpectationResult<O extends string> {
  /** Kernel module the command targeted, without the .ko suffix */
  module: string;
  observed: O;
  expected: O;
  passed: boolean;
  /** Matched pattern index, null on timeout */
  matchIndex: number | null;
}
