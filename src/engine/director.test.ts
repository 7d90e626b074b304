import fs from 'fs-extra';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Scene } from '../content/storyGraph.js';
import {
  GOBLIN_CAVES,
  ScriptedRuleSet,
  captureError,
  linearScenes,
  makeTempDir,
  writeStory,
} from '../testing/testHelpers.js';
import {
  InvalidChoiceError,
  NotStartedError,
  PersistenceIOError,
  SessionOverError,
} from '../utils/errorhandler.js';
import { Character } from './character.js';
import { DiceRoller } from './dice.js';
import { Director, type DirectorOptions } from './director.js';

function recordingDirector(options: DirectorOptions = { seed: 'director' }) {
  const narrated: string[] = [];
  const onWin = vi.fn();
  const onLose = vi.fn();
  const director = new Director({
    ...options,
    hooks: { onNarrate: (scene: Scene) => narrated.push(scene.id), onWin, onLose },
  });
  return { director, narrated, onWin, onLose };
}

describe('Director', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('refuses to play before start and changes nothing', () => {
    const { director, narrated } = recordingDirector();
    const dice = director.dice.getState();

    expect(() => director.playNext()).toThrow(NotStartedError);
    expect(director.status).toBe('uninitialized');
    expect(director.cursor).toBe(-1);
    expect(director.party).toBeNull();
    expect(director.story).toBeNull();
    expect(director.sessionId).toBeNull();
    expect(director.dice.getState()).toEqual(dice);
    expect(narrated).toEqual([]);
  });

  it('rolls with an injected dice roller', () => {
    const dice = new DiceRoller('shared');
    const { director } = recordingDirector({ dice });
    expect(director.dice).toBe(dice);
  });

  it('builds its own roller from a seed', () => {
    const a = recordingDirector({ seed: 'same' }).director;
    const b = recordingDirector({ seed: 'same' }).director;
    expect(a.dice.roll('3d6')).toEqual(b.dice.roll('3d6'));
  });

  it('starts with an empty party at the first scene', () => {
    const { director } = recordingDirector();
    director.start(GOBLIN_CAVES);

    expect(director.status).toBe('active');
    expect(director.cursor).toBe(0);
    expect(director.currentScene?.id).toBe('intro');
    expect(director.party?.size).toBe(0);
    expect(director.sessionId).toMatch(/^session_[\w-]{8}$/);
  });

  it('completes a three-scene story after exactly three plays and wins once', () => {
    const { director, onWin, narrated } = recordingDirector();
    director.start(writeStory(dir, linearScenes('one', 'two', 'three')));

    director.playNext();
    expect(director.cursor).toBe(1);
    director.playNext();
    expect(director.cursor).toBe(2);
    expect(onWin).not.toHaveBeenCalled();
    expect(director.status).toBe('active');

    director.playNext();
    expect(director.cursor).toBe(3);
    expect(director.status).toBe('complete');
    expect(director.currentScene).toBeNull();
    expect(onWin).toHaveBeenCalledTimes(1);
    expect(narrated).toEqual(['one', 'two', 'three']);

    expect(() => director.playNext()).toThrow(SessionOverError);
    expect(onWin).toHaveBeenCalledTimes(1);
    expect(director.cursor).toBe(3);
  });

  it('walks the bundled campaign in order when no choice is given', () => {
    const rules = new ScriptedRuleSet(['unresolved']);
    const { director, narrated, onWin } = recordingDirector({ ruleset: rules });
    director.start(GOBLIN_CAVES);
    expect(director.cursor).toBe(0);

    expect(director.playNext().id).toBe('intro');
    expect(director.cursor).toBe(1);
    expect(narrated).toEqual(['intro']);

    director.playNext();
    expect(director.cursor).toBe(2);
    expect(rules.combats).toEqual([['goblin', 'goblin']]);
    expect(rules.growth).toEqual(['room1']);

    director.playNext();
    expect(director.cursor).toBe(3);
    expect(director.status).toBe('complete');
    expect(onWin).toHaveBeenCalledTimes(1);
  });

  it('follows choices through the graph', () => {
    const { director, narrated, onWin } = recordingDirector({ ruleset: new ScriptedRuleSet() });
    director.start(GOBLIN_CAVES);

    director.playNext('deeper');
    expect(director.currentScene?.id).toBe('room1');
    director.playNext('flee');
    expect(director.currentScene?.id).toBe('intro');
    expect(director.cursor).toBe(0);
    director.playNext('deeper');
    director.playNext('forward');
    expect(director.currentScene?.id).toBe('treasure');
    expect(director.cursor).toBe(2);
    expect(onWin).not.toHaveBeenCalled();

    director.playNext();
    expect(director.status).toBe('complete');
    expect(onWin).toHaveBeenCalledTimes(1);
    expect(narrated).toEqual(['intro', 'room1', 'intro', 'room1', 'treasure']);
  });

  it('rejects a choice the scene does not offer before entering it', () => {
    const { director, narrated } = recordingDirector();
    director.start(GOBLIN_CAVES);

    const error = captureError(() => director.playNext('sideways'), InvalidChoiceError);
    expect(error.userMessage).toBe("You can't do that here. Try: deeper.");
    expect(director.cursor).toBe(0);
    expect(narrated).toEqual([]);
  });

  it('rejects choices on a scene that has none', () => {
    const { director } = recordingDirector();
    director.start(writeStory(dir, linearScenes('only')));
    const error = captureError(() => director.playNext('anything'), InvalidChoiceError);
    expect(error.userMessage).toBe('There are no choices here. Press enter to continue.');
    expect(director.status).toBe('active');
  });

  it('does not treat inherited object keys as choices', () => {
    const { director } = recordingDirector();
    director.start(GOBLIN_CAVES);
    expect(() => director.playNext('toString')).toThrow(InvalidChoiceError);
  });

  it('loses when the rule set reports a defeat', () => {
    const rules = new ScriptedRuleSet(['defeat']);
    const { director, onLose, onWin } = recordingDirector({ ruleset: rules });
    director.start(GOBLIN_CAVES);

    director.playNext();
    director.playNext();
    expect(director.status).toBe('defeated');
    expect(director.cursor).toBe(1);
    expect(onLose).toHaveBeenCalledTimes(1);
    expect(onWin).not.toHaveBeenCalled();
    expect(rules.growth).toEqual([]);
    expect(() => director.playNext()).toThrow(SessionOverError);
  });

  it('keeps its state when start fails', () => {
    const { director } = recordingDirector();
    expect(() => director.start(path.join(dir, 'missing.json'))).toThrow(PersistenceIOError);
    expect(director.status).toBe('uninitialized');

    director.start(GOBLIN_CAVES);
    director.playNext();
    expect(() => director.start(path.join(dir, 'missing.json'))).toThrow(PersistenceIOError);
    expect(director.cursor).toBe(1);
  });

  it('resets the party on a new start', () => {
    const { director } = recordingDirector();
    director.start(GOBLIN_CAVES);
    director.party?.add(new Character({ name: 'Lyra' }));
    director.start(GOBLIN_CAVES);
    expect(director.party?.size).toBe(0);
  });

  it('refuses to save before start', () => {
    const { director } = recordingDirector();
    expect(() => director.save(path.join(dir, 'save.json'))).toThrow(NotStartedError);
  });

  it('replaces the running session on load', () => {
    const savePath = path.join(dir, 'save.json');
    const { director: a } = recordingDirector({ seed: 'a' });
    a.start(GOBLIN_CAVES);
    a.party?.add(new Character({ name: 'Lyra', xp: 40 }));
    a.playNext('deeper');
    a.dice.roll('2d6');
    a.save(savePath);

    const { director: b } = recordingDirector({ seed: 'b' });
    b.start(writeStory(dir, linearScenes('x', 'y', 'z', 'w')));
    b.party?.add(new Character({ name: 'Bram' }));
    b.playNext();
    b.playNext();
    b.playNext();

    b.load(savePath);
    expect(b.party?.toJSON()).toEqual(a.party?.toJSON());
    expect(b.story?.toJSON()).toEqual(a.story?.toJSON());
    expect(b.cursor).toBe(1);
    expect(b.currentScene?.id).toBe('room1');
    expect(b.status).toBe('active');
    expect(b.dice.roll('1d20')).toEqual(a.dice.roll('1d20'));
  });

  it('keeps the running session when a load fails', () => {
    const { director } = recordingDirector();
    director.start(GOBLIN_CAVES);
    director.playNext();

    expect(() => director.load(path.join(dir, 'missing.json'))).toThrow(PersistenceIOError);
    expect(director.cursor).toBe(1);
    expect(director.status).toBe('active');
  });

  it('can resume a finished campaign from a save made after winning', () => {
    const savePath = path.join(dir, 'done.json');
    const { director } = recordingDirector();
    director.start(writeStory(dir, linearScenes('a')));
    director.playNext();
    director.save(savePath);

    const { director: other, onWin } = recordingDirector();
    other.load(savePath);
    expect(other.status).toBe('complete');
    expect(other.cursor).toBe(1);
    expect(onWin).not.toHaveBeenCalled();
  });
});
