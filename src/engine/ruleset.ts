import type { CombatOutcome } from '../models.js';
import type { Scene } from '../content/storyGraph.js';
import { logger } from '../utils/logger.js';
import type { DiceRoller } from './dice.js';
import type { Party } from './party.js';

/**
 * Combat and growth rules. The director calls these when a scene with
 * monsters is entered; it has no opinion on how either is resolved.
 */
export interface RuleSet {
  resolveCombat(party: Party, monsters: readonly string[], dice: DiceRoller): CombatOutcome;
  applyGrowth(scene: Scene, party: Party): void;
}

/** Resolves nothing. Stands in until real combat and growth rules exist. */
export class PlaceholderRuleSet implements RuleSet {
  resolveCombat(party: Party, monsters: readonly string[]): CombatOutcome {
    logger.warn('Combat requested but no rule set is configured', {
      monsters: [...monsters],
      partySize: party.size,
    });
    return 'unresolved';
  }

  applyGrowth(scene: Scene, party: Party): void {
    logger.warn('Growth requested but no rule set is configured', {
      sceneId: scene.id,
      partySize: party.size,
    });
  }
}
