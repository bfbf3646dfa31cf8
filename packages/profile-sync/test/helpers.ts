/**
 * Shared helpers for profile-sync tests.
 */

import { expect } from 'chai';
import type { SyncResult } from '../src/model/types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(payload: Uint8Array): string {
  return decoder.decode(payload);
}

type ResultWith<K extends SyncResult['outcome']> = Extract<SyncResult, { outcome: K }>;

function hasOutcome<K extends SyncResult['outcome']>(result: SyncResult, outcome: K): result is ResultWith<K> {
  return result.outcome === outcome;
}

/**
 * Assert a result's outcome and narrow it.
 */
export function expectOutcome<K extends SyncResult['outcome']>(result: SyncResult, outcome: K): ResultWith<K> {
  if (!hasOutcome(result, outcome)) {
    expect.fail(`Expected outcome ${outcome}, got ${result.outcome}`);
  }
  return result;
}

/** Fixed clock at 2026-01-01T00:00:00Z, advanced by assigning `current`. */
export class TestClock {
  current = new Date('2026-01-01T00:00:00Z');

  readonly now = (): Date => new Date(this.current);

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}
