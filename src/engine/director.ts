import { nanoid } from 'nanoid';
import { loadStory } from '../content/contentLoader.js';
import type { Scene, SceneHost, StoryGraph } from '../content/storyGraph.js';
import type { DirectorStatus, RngState } from '../models.js';
import { loadSnapshot, saveSnapshot } from '../persistence/serializer.js';
import {
  InvalidChoiceError,
  NotStartedError,
  SessionOverError,
} from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { DiceRoller } from './dice.js';
import { applyToDirector, fromDirector, storyChanged } from './gameState.js';
import { Party } from './party.js';
import type { RngSeed } from './rng.js';
import { PlaceholderRuleSet, type RuleSet } from './ruleset.js';

export interface DirectorHooks {
  onNarrate(scene: Scene): void;
  onWin(): void;
  onLose(): void;
}

interface DirectorBaseOptions {
  ruleset?: RuleSet;
  hooks?: Partial<DirectorHooks>;
}

/** Either a seed for a fresh roller or a ready-made roller, never both. */
export type DirectorOptions = DirectorBaseOptions &
  ({ seed?: RngSeed; dice?: never } | { dice: DiceRoller; seed?: never });

export interface RestoredSession {
  party: Party;
  story: StoryGraph;
  cursor: number;
  rngState: RngState;
}

const defaultHooks: DirectorHooks = {
  onNarrate: (scene) => logger.info(scene.text.trim(), { sceneId: scene.id }),
  onWin: () => logger.info('Congratulations, you won!'),
  onLose: () => logger.info('Game over - better luck next time.'),
};

/**
 * Runs a campaign one scene at a time.
 *
 * The cursor is the id of the scene about to be played. A choice key picks the
 * next scene from the current scene's `choices`; without one the director
 * falls through to the next scene in authored order, and running off the end
 * of the story completes the campaign.
 */
export class Director implements SceneHost {
  readonly dice: DiceRoller;
  readonly ruleset: RuleSet;
  private readonly hooks: DirectorHooks;

  private _party: Party | null = null;
  private _story: StoryGraph | null = null;
  private currentSceneId: string | null = null;
  private _status: DirectorStatus = 'uninitialized';
  private _sessionId: string | null = null;

  constructor(options: DirectorOptions = {}) {
    this.dice = options.dice ?? new DiceRoller(options.seed);
    this.ruleset = options.ruleset ?? new PlaceholderRuleSet();
    this.hooks = { ...defaultHooks, ...options.hooks };
  }

  get status(): DirectorStatus {
    return this._status;
  }

  get party(): Party | null {
    return this._party;
  }

  get story(): StoryGraph | null {
    return this._story;
  }

  get sessionId(): string | null {
    return this._sessionId;
  }

  /** Index of the scene about to be played: -1 before start, scene count once complete. */
  get cursor(): number {
    if (!this._story) return -1;
    if (this.currentSceneId === null) return this._story.size;
    return this._story.indexOf(this.currentSceneId);
  }

  get currentScene(): Scene | null {
    if (!this._story || this.currentSceneId === null) return null;
    return this._story.get(this.currentSceneId) ?? null;
  }

  // ──────────────── Public API ────────────────

  /** Loads the story and starts a fresh campaign with an empty party. */
  start(storyPath: string): void {
    const story = loadStory(storyPath);
    this.begin(story, new Party(), story.sceneAt(0)?.id ?? null);
    logger.info('Campaign started', { storyPath, scenes: story.size, sessionId: this._sessionId });
  }

  /** Plays the current scene and moves the cursor. Returns the scene played. */
  playNext(choiceKey?: string): Scene {
    const { story, party, scene } = this.requireActive('playNext');

    let nextId: string | null;
    if (choiceKey !== undefined) {
      if (!Object.hasOwn(scene.choices, choiceKey)) {
        throw new InvalidChoiceError(scene.id, choiceKey, scene.choiceKeys);
      }
      nextId = scene.choices[choiceKey];
    } else {
      nextId = story.sceneAt(story.indexOf(scene.id) + 1)?.id ?? null;
    }

    const outcome = scene.enter(party, this);
    if (outcome === 'defeat') {
      this._status = 'defeated';
      logger.info('Campaign lost', { sceneId: scene.id, sessionId: this._sessionId });
      this.loseScreen();
      return scene;
    }

    this.currentSceneId = nextId;
    if (nextId === null) {
      this._status = 'complete';
      logger.info('Campaign complete', { scenes: story.size, sessionId: this._sessionId });
      this.winScreen();
    }
    return scene;
  }

  narrate(scene: Scene): void {
    logger.debug('Scene entered', { sceneId: scene.id, monsters: scene.monsters.length });
    this.hooks.onNarrate(scene);
  }

  // ──────────────── Persistence ────────────────

  save(p: string): void {
    saveSnapshot(fromDirector(this), p);
  }

  load(p: string): void {
    const snapshot = loadSnapshot(p);
    const previous = this._story?.toJSON() ?? null;
    applyToDirector(snapshot, this);
    if (previous && storyChanged(previous, snapshot.story_state)) {
      logger.info('Loaded save uses different story content', { path: p });
    }
  }

  /** Replaces the whole session. Used by snapshot loading. */
  restore(session: RestoredSession): void {
    // dice first: a rejected RNG state must leave the running session untouched
    this.dice.setState(session.rngState);
    this.begin(session.story, session.party, session.story.sceneAt(session.cursor)?.id ?? null);
  }

  // ──────────────── UI hooks ────────────────

  winScreen(): void {
    this.hooks.onWin();
  }

  loseScreen(): void {
    this.hooks.onLose();
  }

  // ──────────────── Internals ────────────────

  private begin(story: StoryGraph, party: Party, sceneId: string | null): void {
    this._story = story;
    this._party = party;
    this.currentSceneId = sceneId;
    this._status = sceneId === null ? 'complete' : 'active';
    this._sessionId = `session_${nanoid(8)}`;
  }

  private requireActive(operation: string): { story: StoryGraph; party: Party; scene: Scene } {
    if (this._status === 'complete' || this._status === 'defeated') {
      throw new SessionOverError(this._status);
    }
    const scene = this.currentScene;
    if (this._status !== 'active' || !this._story || !this._party || !scene) {
      throw new NotStartedError(operation);
    }
    return { story: this._story, party: this._party, scene };
  }
}
