import { logger } from './logger.js';

export class GameError extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'UNKNOWN_ERROR',
    userMessage?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.userMessage = userMessage || 'Something went wrong. Please try again.';
    this.context = context;
  }
}

export class InvalidDiceExpressionError extends GameError {
  constructor(expression: string) {
    super(
      `Invalid dice expression: ${expression}`,
      'INVALID_DICE_EXPRESSION',
      `"${expression}" is not a dice expression like 2d6+3.`,
      { expression }
    );
    this.name = 'InvalidDiceExpressionError';
  }
}

export class NotStartedError extends GameError {
  constructor(operation: string) {
    super(
      `Director.start() must be called before ${operation}()`,
      'NOT_STARTED',
      'No campaign is running. Start one first.',
      { operation }
    );
    this.name = 'NotStartedError';
  }
}

export class SessionOverError extends GameError {
  constructor(status: string) {
    super(
      `Campaign already ended (${status})`,
      'SESSION_OVER',
      'This campaign is over. Start or load another one.',
      { status }
    );
    this.name = 'SessionOverError';
  }
}

export class InvalidChoiceError extends GameError {
  constructor(sceneId: string, choice: string, available: string[]) {
    super(
      `Scene "${sceneId}" has no choice "${choice}"`,
      'INVALID_CHOICE',
      available.length
        ? `You can't do that here. Try: ${available.join(', ')}.`
        : "There are no choices here. Press enter to continue.",
      { sceneId, choice, available }
    );
    this.name = 'InvalidChoiceError';
  }
}

export class ContentFormatError extends GameError {
  constructor(message: string, source?: string, issues: string[] = []) {
    super(
      message,
      'CONTENT_FORMAT_ERROR',
      'The campaign content could not be loaded.',
      { source, issues }
    );
    this.name = 'ContentFormatError';
  }
}

export class SnapshotFormatError extends GameError {
  constructor(message: string, source?: string, issues: string[] = []) {
    super(
      message,
      'SNAPSHOT_FORMAT_ERROR',
      'The save file is damaged or from an incompatible version.',
      { source, issues }
    );
    this.name = 'SnapshotFormatError';
  }
}

export class PersistenceIOError extends GameError {
  constructor(message: string, operation: 'read' | 'write', filePath: string, cause?: unknown) {
    super(
      message,
      'IO_ERROR',
      operation === 'read' ? `Could not read ${filePath}.` : `Could not write ${filePath}.`,
      {
        operation,
        path: filePath,
        cause: cause instanceof Error ? cause.message : cause,
      }
    );
    this.name = 'PersistenceIOError';
  }
}

// Error reporting helpers
export function formatErrorForUser(error: unknown): string {
  if (error instanceof GameError) {
    return error.userMessage;
  }

  // Don't expose internal errors to players
  return 'An unexpected error occurred. Please try again.';
}

export function formatErrorForLogging(error: unknown, context?: Record<string, unknown>) {
  const baseInfo = {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    name: error instanceof Error ? error.name : 'Unknown',
    ...context
  };

  if (error instanceof GameError) {
    return {
      ...baseInfo,
      code: error.code,
      userMessage: error.userMessage,
      context: error.context
    };
  }

  return baseInfo;
}

export function trackError(error: unknown, context?: Record<string, unknown>) {
  logger.error('Error tracked', formatErrorForLogging(error, context));
}
