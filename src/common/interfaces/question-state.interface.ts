/**
 * Steps a question moves through. Every step except the terminal one carries
 * a `ready` flag that says whether the next poll may advance the game.
 */
export type ReadyStateName =
  | 'Results'
  | 'NormalQAnswering'
  | 'BettingQBetting'
  | 'BettingQAnswering'
  | 'EstimationQAnswering'
  | 'VersusQSelecting'
  | 'VersusQAnswering';

export type AnsweringStateName =
  | 'NormalQAnswering'
  | 'BettingQAnswering'
  | 'EstimationQAnswering'
  | 'VersusQAnswering';

export type ReadyState = {
  [N in ReadyStateName]: { readonly name: N; readonly ready: boolean };
}[ReadyStateName];

export type QuestionState = ReadyState | { readonly name: 'GameEnding' };

export const ANSWERING_STATES: readonly AnsweringStateName[] = [
  'NormalQAnswering',
  'BettingQAnswering',
  'EstimationQAnswering',
  'VersusQAnswering',
];

export function waiting<N extends ReadyStateName>(
  name: N,
): { readonly name: N; readonly ready: boolean } {
  return { name, ready: false };
}

export function markReady(state: ReadyState): ReadyState {
  return { ...state, ready: true };
}

/**
 * True when the state is one of `names` and still waits for player input.
 */
export function isWaiting<N extends ReadyStateName>(
  state: QuestionState,
  names: readonly N[],
): state is Extract<ReadyState, { name: N }> {
  if (state.name === 'GameEnding' || state.ready) {
    return false;
  }
  return names.some((name) => name === state.name);
}

export function isReady(state: QuestionState): state is ReadyState {
  return state.name !== 'GameEnding' && state.ready;
}

export function describeState(state: QuestionState): string {
  return state.name === 'GameEnding'
    ? state.name
    : `${state.name}(${String(state.ready)})`;
}
