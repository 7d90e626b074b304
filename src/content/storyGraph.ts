import { storySchema, formatIssues, type CombatOutcome, type SceneDef, type StoryDef } from '../models.js';
import type { DiceRoller } from '../engine/dice.js';
import type { Party } from '../engine/party.js';
import type { RuleSet } from '../engine/ruleset.js';
import { ContentFormatError } from '../utils/errorhandler.js';

/** What a scene needs from whoever is running it. */
export interface SceneHost {
  readonly dice: DiceRoller;
  readonly ruleset: RuleSet;
  narrate(scene: Scene): void;
}

export class Scene {
  readonly id: string;
  readonly text: string;
  readonly monsters: readonly string[];
  readonly choices: Readonly<Record<string, string>>;

  constructor(def: SceneDef) {
    this.id = def.id;
    this.text = def.text;
    this.monsters = Object.freeze([...def.monsters]);
    this.choices = Object.freeze({ ...def.choices });
  }

  get choiceKeys(): string[] {
    return Object.keys(this.choices);
  }

  get hasEncounter(): boolean {
    return this.monsters.length > 0;
  }

  /**
   * Narrates the scene and, when monsters are present, hands the encounter to
   * the host's rule set. Returns null for scenes without an encounter.
   */
  enter(party: Party, host: SceneHost): CombatOutcome | null {
    host.narrate(this);
    if (!this.hasEncounter) return null;

    const outcome = host.ruleset.resolveCombat(party, this.monsters, host.dice);
    if (outcome !== 'defeat') {
      host.ruleset.applyGrowth(this, party);
    }
    return outcome;
  }

  toJSON(): SceneDef {
    return {
      id: this.id,
      text: this.text,
      monsters: [...this.monsters],
      choices: { ...this.choices },
    };
  }
}

/** Ordered scenes; the order is the default path through the campaign. */
export class StoryGraph {
  readonly scenes: readonly Scene[];
  private readonly byId = new Map<string, number>();

  constructor(scenes: Scene[]) {
    this.scenes = Object.freeze([...scenes]);
    this.scenes.forEach((scene, index) => {
      // first definition wins; duplicates are reported by the content validator
      if (!this.byId.has(scene.id)) this.byId.set(scene.id, index);
    });
  }

  get size(): number {
    return this.scenes.length;
  }

  sceneAt(index: number): Scene | undefined {
    return this.scenes[index];
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): Scene | undefined {
    const index = this.byId.get(id);
    return index === undefined ? undefined : this.scenes[index];
  }

  /** -1 when the id is unknown. */
  indexOf(id: string): number {
    return this.byId.get(id) ?? -1;
  }

  toJSON(): StoryDef {
    return { scenes: this.scenes.map((s) => s.toJSON()) };
  }

  static fromJSON(data: unknown, source?: string): StoryGraph {
    const parsed = storySchema.safeParse(data);
    if (!parsed.success) {
      throw new ContentFormatError(
        `Invalid story content${source ? ` in ${source}` : ''}`,
        source,
        formatIssues(parsed.error)
      );
    }
    return new StoryGraph(parsed.data.scenes.map((def) => new Scene(def)));
  }
}
