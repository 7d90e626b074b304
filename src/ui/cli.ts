import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { CFG, campaignPath } from '../config.js';
import { Director, type DirectorOptions } from '../engine/director.js';
import { GameError, formatErrorForUser, trackError } from '../utils/errorhandler.js';

export type Command =
  | { kind: 'advance' }
  | { kind: 'choose'; key: string }
  | { kind: 'save' }
  | { kind: 'load' }
  | { kind: 'choices' }
  | { kind: 'quit' };

export const PROMPT = '[enter] next, <choice>, c)hoices, s)ave, l)oad, q)uit → ';

/**
 * Commands match on their first letter. Anything else that is not empty is a
 * choice key; a key of the current scene wins over a command that shares its
 * first letter, and `go <key>` always picks a choice.
 */
export function parseCommand(input: string, choiceKeys: readonly string[] = []): Command {
  const trimmed = input.trim();
  if (!trimmed) return { kind: 'advance' };

  const go = /^(?:go|g)\s+(.+)$/i.exec(trimmed);
  if (go) return { kind: 'choose', key: go[1].trim() };
  if (choiceKeys.includes(trimmed)) return { kind: 'choose', key: trimmed };

  const lower = trimmed.toLowerCase();
  if (lower.startsWith('s')) return { kind: 'save' };
  if (lower.startsWith('q')) return { kind: 'quit' };
  if (lower.startsWith('l')) return { kind: 'load' };
  if (lower.startsWith('c')) return { kind: 'choices' };
  return { kind: 'choose', key: trimmed };
}

export interface CommandResult {
  quit: boolean;
  message?: string;
}

/** Applies one command to the director. Game errors propagate to the caller. */
export function handleCommand(director: Director, command: Command, savePath: string): CommandResult {
  switch (command.kind) {
    case 'quit':
      return { quit: true };
    case 'save':
      director.save(savePath);
      return { quit: false, message: 'Saved.' };
    case 'load':
      director.load(savePath);
      return { quit: false, message: 'Loaded.' };
    case 'choices': {
      const keys = director.currentScene?.choiceKeys ?? [];
      return { quit: false, message: keys.length ? `Choices: ${keys.join(', ')}` : 'No choices here.' };
    }
    case 'choose':
      director.playNext(command.key);
      break;
    case 'advance':
      director.playNext();
      break;
  }
  return { quit: director.status === 'complete' || director.status === 'defeated' };
}

export interface CliOptions {
  storyPath?: string;
  savePath?: string;
  input?: Readable;
  output?: Writable;
  director?: DirectorOptions;
}

export async function runCli(options: CliOptions = {}): Promise<void> {
  const output = options.output ?? process.stdout;
  const savePath = options.savePath ?? CFG.savePath;
  const write = (line: string) => output.write(`${line}\n`);

  const base: DirectorOptions = options.director ?? { seed: CFG.rngSeed };
  const director = new Director({
    ...base,
    hooks: {
      onNarrate: (scene) => write(scene.text.trimEnd()),
      onWin: () => write('Congratulations, you won!'),
      onLose: () => write('Game over - better luck next time.'),
      ...base.hooks,
    },
  });
  director.start(options.storyPath ?? campaignPath());

  const rl = createInterface({ input: options.input ?? process.stdin, output });
  rl.setPrompt(PROMPT);
  rl.prompt();
  for await (const line of rl) {
    try {
      const result = handleCommand(
        director,
        parseCommand(line, director.currentScene?.choiceKeys),
        savePath
      );
      if (result.message) write(result.message);
      if (result.quit) break;
    } catch (error) {
      if (!(error instanceof GameError)) {
        trackError(error, { command: line });
        rl.close();
        throw error;
      }
      write(formatErrorForUser(error));
    }
    rl.prompt();
  }
  rl.close();
}
