export type GameshowErrorKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'PhaseMismatch'
  | 'NoJokersLeft'
  | 'LoadFailure';

/**
 * Rejected action. Thrown before anything in the store is touched, so the
 * game state is the same as before the call.
 */
export class GameshowError extends Error {
  constructor(
    public readonly kind: GameshowErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'GameshowError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
