import fs from 'fs-extra';
import type { GameStateSnapshot } from '../models.js';
import { parseSnapshot } from '../engine/gameState.js';
import { PersistenceIOError, SnapshotFormatError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

// Overwrites in place. There is no temp-file rename or backup, and concurrent
// writers to the same path are the caller's problem.
export function saveSnapshot(snapshot: GameStateSnapshot, p: string): void {
  try {
    fs.outputJsonSync(p, snapshot, { spaces: 2 });
  } catch (error) {
    throw new PersistenceIOError(`Could not write save file ${p}`, 'write', p, error);
  }
  logger.info('Game saved', { path: p, scene: snapshot.current_scene_idx });
}

export function loadSnapshot(p: string): GameStateSnapshot {
  let raw: string;
  try {
    raw = fs.readFileSync(p, 'utf8');
  } catch (error) {
    throw new PersistenceIOError(`Could not read save file ${p}`, 'read', p, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotFormatError(
      `Save file ${p} is not valid JSON`,
      p,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  const snapshot = parseSnapshot(data, p);
  logger.info('Game loaded', { path: p, scene: snapshot.current_scene_idx });
  return snapshot;
}
