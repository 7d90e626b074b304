import { nanoid } from 'nanoid';
import { rngStateSchema, formatIssues, type RngState } from '../models.js';
import { SnapshotFormatError } from '../utils/errorhandler.js';

export type RngSeed = number | string;

/** A pseudo-random stream whose position can be captured and resumed. */
export interface Rng {
  /** Next float in [0, 1). */
  next(): number;
  serialize(): RngState;
  restore(state: unknown): void;
}

export function hashSeed(seed: RngSeed): number {
  if (typeof seed === 'number') return seed >>> 0;
  // FNV-1a
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export class Mulberry32 implements Rng {
  private state: number;

  constructor(seed: RngSeed = nanoid(12)) {
    this.state = hashSeed(seed);
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  serialize(): RngState {
    return { algorithm: 'mulberry32', state: this.state };
  }

  restore(state: unknown): void {
    const parsed = rngStateSchema.safeParse(state);
    if (!parsed.success) {
      throw new SnapshotFormatError('Unrecognised RNG state', undefined, formatIssues(parsed.error));
    }
    this.state = parsed.data.state;
  }
}
