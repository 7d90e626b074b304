import equal from 'fast-deep-equal';
import { ContentValidator } from '../content/contentValidator.js';
import { Scene, StoryGraph } from '../content/storyGraph.js';
import { formatIssues, snapshotSchema, type GameStateSnapshot, type StoryDef } from '../models.js';
import { NotStartedError, SnapshotFormatError } from '../utils/errorhandler.js';
import type { Director } from './director.js';
import { Party } from './party.js';

const validator = new ContentValidator();

/** Captures everything needed to resume the director exactly where it is. */
export function fromDirector(director: Director): GameStateSnapshot {
  const { party, story } = director;
  if (!party || !story) throw new NotStartedError('save');
  return {
    party: party.toJSON(),
    story_state: story.toJSON(),
    current_scene_idx: director.cursor,
    rng_state: director.dice.getState(),
    saved_at: Date.now(),
  };
}

/** Replaces the director's session with the snapshot's; nothing is merged. */
export function applyToDirector(snapshot: GameStateSnapshot, director: Director): void {
  director.restore({
    party: Party.fromJSON(snapshot.party),
    story: new StoryGraph(snapshot.story_state.scenes.map((def) => new Scene(def))),
    cursor: snapshot.current_scene_idx,
    rngState: snapshot.rng_state,
  });
}

export function parseSnapshot(data: unknown, source?: string): GameStateSnapshot {
  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new SnapshotFormatError(
      `Invalid save data${source ? ` in ${source}` : ''}`,
      source,
      formatIssues(parsed.error)
    );
  }
  const result = validator.validateStory(parsed.data.story_state);
  if (!result.ok) {
    throw new SnapshotFormatError(
      `Saved story${source ? ` in ${source}` : ''} is inconsistent`,
      source,
      result.issues.map((issue) => `story_state.${issue.path}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function storyChanged(a: StoryDef | null | undefined, b: StoryDef | null | undefined): boolean {
  return !equal(a, b);
}

export function snapshotsEqual(a: GameStateSnapshot, b: GameStateSnapshot): boolean {
  const { saved_at: _a, ...restA } = a;
  const { saved_at: _b, ...restB } = b;
  return equal(restA, restB);
}
