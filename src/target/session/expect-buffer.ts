/**
 * Accumulating output buffer with pexpect-style matching.
 *
 * Among all patterns, the match starting earliest in the buffer wins; on a
 * tie the lower pattern index wins. Consuming a match drops everything up to
 * its end.
 */

import stripAnsi from 'strip-ansi';
import type { Pattern } from './session-channel.js';

export interface BufferMatch {
  index: number;
  before: string;
  matched: string;
}

interface Located {
  start: number;
  end: number;
}

const DEFAULT_MAX_BUFFER = 64 * 1024;

function locate(text: string, pattern: Pattern): Located | null {
  if (typeof pattern === 'string') {
    const start = text.indexOf(pattern);
    return start < 0 ? null : { start, end: start + pattern.length };
  }

  // A global or sticky flag would make exec() depend on lastIndex
  const flags = pattern.flags.replace(/[gy]/g, '');
  const match = new RegExp(pattern.source, flags).exec(text);
  if (!match) {
    return null;
  }
  return { start: match.index, end: match.index + match[0].length };
}

export class ExpectBuffer {
  private buffer = '';

  constructor(private readonly maxSize = DEFAULT_MAX_BUFFER) {}

  get contents(): string {
    return this.buffer;
  }

  append(chunk: string): void {
    this.buffer += stripAnsi(chunk).replace(/\r/g, '');
    if (this.buffer.length > this.maxSize) {
      this.buffer = this.buffer.slice(this.buffer.length - this.maxSize);
    }
  }

  consume(patterns: readonly Pattern[]): BufferMatch | null {
    let best: { index: number; located: Located } | null = null;

    for (let index = 0; index < patterns.length; index++) {
      const located = locate(this.buffer, patterns[index]);
      if (located && (best === null || located.start < best.located.start)) {
        best = { index, located };
      }
    }

    if (best === null) {
      return null;
    }

    const { start, end } = best.located;
    const result: BufferMatch = {
      index: best.index,
      before: this.buffer.slice(0, start),
      matched: this.buffer.slice(start, end),
    };
    this.buffer = this.buffer.slice(end);
    return result;
  }

  clear(): void {
    this.buffer = '';
  }
}
