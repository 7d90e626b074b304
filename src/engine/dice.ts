import type { RngState } from '../models.js';
import { InvalidDiceExpressionError } from '../utils/errorhandler.js';
import { Mulberry32, type Rng, type RngSeed } from './rng.js';

export type RollResult = { total: number; rolls: number[]; modifier: number; detail: string };

const DICE_RE = /^(\d+)d(\d+)([+-]\d+)?$/;

/** Most dice a single expression may roll. */
export const MAX_DICE = 1000;

export interface DiceExpression {
  count: number;
  sides: number;
  modifier: number;
}

export function parseDiceExpression(expr: string): DiceExpression {
  const match = DICE_RE.exec(expr);
  if (!match) {
    throw new InvalidDiceExpressionError(expr);
  }
  const count = Number.parseInt(match[1], 10);
  const sides = Number.parseInt(match[2], 10);
  const modifier = match[3] ? Number.parseInt(match[3], 10) : 0;
  if (![count, sides, modifier].every(Number.isSafeInteger)) {
    throw new InvalidDiceExpressionError(expr);
  }
  if (count < 1 || count > MAX_DICE || sides < 1) {
    throw new InvalidDiceExpressionError(expr);
  }
  // every possible total, highest and lowest, must stay a safe integer
  if (count * sides + Math.abs(modifier) > Number.MAX_SAFE_INTEGER) {
    throw new InvalidDiceExpressionError(expr);
  }
  return { count, sides, modifier };
}

/** Parses dice notation like `2d6+3` and rolls against an injected generator. */
export class DiceRoller {
  private readonly rng: Rng;

  constructor(seedOrRng?: RngSeed | Rng) {
    this.rng = typeof seedOrRng === 'object' ? seedOrRng : new Mulberry32(seedOrRng);
  }

  rollDie(sides: number): number {
    return Math.floor(this.rng.next() * sides) + 1;
  }

  roll(expr: string): RollResult {
    const { count, sides, modifier } = parseDiceExpression(expr);

    const rolls = Array.from({ length: count }, () => this.rollDie(sides));
    const total = rolls.reduce((sum, roll) => sum + roll, 0) + modifier;
    const modifierText = modifier === 0 ? '' : modifier > 0 ? `+${modifier}` : `${modifier}`;

    return {
      total,
      rolls,
      modifier,
      detail: `${count}d${sides}${modifierText} (${rolls.join(', ')})`
    };
  }

  // RNG state for save/load
  getState(): RngState {
    return this.rng.serialize();
  }

  setState(state: unknown): void {
    this.rng.restore(state);
  }
}
