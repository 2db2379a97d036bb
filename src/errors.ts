export type GameErrorKind =
  | 'UnsupportedPlayerCount'
  | 'InvalidRound'
  | 'IllegalProposal'
  | 'IllegalVote'
  | 'IllegalMissionVote'
  | 'IllegalAssassination'
  | 'IllegalSpeech'
  | 'IllegalTransition'
  | 'DecisionRejected'
  | 'ProviderUnavailable'
  | 'GameNotFound'
  | 'InvalidConfig';

/**
 * Rule violation raised by the catalog, the engine or a session.
 *
 * Engine operations throw this before touching any state, so a caught
 * `GameRuleError` always means the game is exactly as it was before the call.
 */
export class GameRuleError extends Error {
  readonly kind: GameErrorKind;

  constructor(kind: GameErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GameRuleError';
    this.kind = kind;
  }
}

export function isGameRuleError(error: unknown, kind?: GameErrorKind): error is GameRuleError {
  return error instanceof GameRuleError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
