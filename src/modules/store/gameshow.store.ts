import { Mutex, MutexInterface } from 'async-mutex';
import { PlayerData } from '../../common/interfaces/player.interface';
import { Question } from '../../common/interfaces/question.interface';
import { GameEvent } from '../../common/interfaces/game-event.interface';
import {
  QuestionState,
  waiting,
} from '../../common/interfaces/question-state.interface';

export interface StoreState {
  phase: QuestionState;
  questions: readonly Question[];
  players: PlayerData[];
  events: GameEvent[];
}

export type StoreField = keyof StoreState;

/**
 * Acquisition order for every caller that needs more than one field.
 */
export const LOCK_ORDER: readonly StoreField[] = [
  'phase',
  'questions',
  'players',
  'events',
];

export type LockedState<K extends StoreField> = Pick<StoreState, K>;

/**
 * The single shared game-show state of the process. Each field has its own
 * lock; `withLocks` hands a callback exactly the fields it asked for, after
 * taking their locks in LOCK_ORDER.
 *
 * The current question index lives outside the locks and is only changed
 * through `fetchAddIndex`, `swapIndex` and `storeIndex`.
 */
export class GameshowStore {
  private readonly state: StoreState;
  private readonly locks: Record<StoreField, Mutex> = {
    phase: new Mutex(),
    questions: new Mutex(),
    players: new Mutex(),
    events: new Mutex(),
  };
  private currentQuestion = 0;

  constructor(questions: readonly Question[]) {
    this.state = {
      phase: waiting('Results'),
      questions,
      players: [],
      events: [],
    };
  }

  /**
   * Run `fn` while holding the locks of `fields`. `fn` must be synchronous:
   * no lock is ever held across an await.
   */
  async withLocks<K extends StoreField, T>(
    fields: readonly K[],
    fn: (state: LockedState<K>) => T,
  ): Promise<T> {
    const wanted = new Set<StoreField>(fields);
    const releasers: MutexInterface.Releaser[] = [];

    try {
      for (const field of LOCK_ORDER) {
        if (wanted.has(field)) {
          releasers.push(await this.locks[field].acquire());
        }
      }
      return fn(this.state);
    } finally {
      for (const release of releasers.reverse()) {
        release();
      }
    }
  }

  /**
   * The question at the current index, looked up in the locked question list.
   */
  questionAt(questions: readonly Question[]): Question {
    const index = this.currentQuestion;
    const question = questions[index - 1];
    // Reloads and jumps reset the state to Results, so this only fires on a
    // broken store
    if (index < 1 || question === undefined) {
      throw new Error(`No question loaded at index ${index}`);
    }
    return question;
  }

  loadIndex(): number {
    return this.currentQuestion;
  }

  /** Returns the index before the addition. */
  fetchAddIndex(delta: number): number {
    const previous = this.currentQuestion;
    this.currentQuestion += delta;
    return previous;
  }

  /** Returns the index before the swap. */
  swapIndex(value: number): number {
    const previous = this.currentQuestion;
    this.currentQuestion = value;
    return previous;
  }

  storeIndex(value: number): void {
    this.currentQuestion = value;
  }
}
