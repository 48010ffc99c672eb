// ============================================================================
// ENGINE ERRORS
// ============================================================================
// Fatal problems are thrown. Per-prop problems are caught by the pipeline and
// turned into SkippedProp entries so one player never aborts a batch.
// ============================================================================

import type { StatCategory, Sport } from '@/types/props';

export type PropEngineErrorCode =
  | 'PLAYER_NOT_FOUND'
  | 'UNSUPPORTED_STAT'
  | 'INVALID_CONFIGURATION';

export class PropEngineError extends Error {
  readonly code: PropEngineErrorCode;

  constructor(code: PropEngineErrorCode, message: string) {
    super(message);
    this.name = 'PropEngineError';
    this.code = code;
  }
}

export class PlayerNotFoundError extends PropEngineError {
  readonly playerId: string;

  constructor(playerId: string) {
    super('PLAYER_NOT_FOUND', `No game-log record for player "${playerId}"`);
    this.name = 'PlayerNotFoundError';
    this.playerId = playerId;
  }
}

export class UnsupportedStatCategoryError extends PropEngineError {
  constructor(sport: Sport, category: StatCategory) {
    super('UNSUPPORTED_STAT', `${sport.toUpperCase()} game logs do not record "${category}"`);
    this.name = 'UnsupportedStatCategoryError';
  }
}

export class InvalidConfigurationError extends PropEngineError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('INVALID_CONFIGURATION', `Invalid engine configuration: ${problems.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.problems = problems;
  }
}

/**
 * Message text for anything caught from a data source.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
