import { Injectable, Logger } from '@nestjs/common';
import { GameshowStore } from '../store/gameshow.store';
import { QuestionLoaderService } from '../questions/question-loader.service';
import { GameshowError } from '../../common/errors/gameshow.error';
import { Question } from '../../common/interfaces/question.interface';
import { findPlayer } from '../../common/utils/player.utils';
import {
  ANSWERING_STATES,
  QuestionState,
  isWaiting,
  markReady,
  waiting,
} from '../../common/interfaces/question-state.interface';

export interface MoneyUpdate {
  name: string;
  money: number;
}

export interface JokersUpdate {
  name: string;
  jokers: number;
}

// Jumps and reloads are only allowed between questions or after the show
function isBetweenQuestions(state: QuestionState): boolean {
  return state.name === 'GameEnding' || isWaiting(state, ['Results']);
}

/**
 * Moderator controls: removing players, forcing the show forward when
 * players stall, and steering which question comes next.
 */
@Injectable()
export class ModeratorService {
  private readonly logger = new Logger(ModeratorService.name);

  constructor(
    private readonly store: GameshowStore,
    private readonly questionLoader: QuestionLoaderService,
  ) {}

  async kick(name: string): Promise<void> {
    await this.store.withLocks(['players'], (state) => {
      const index = state.players.findIndex((player) => player.name === name);
      if (index === -1) {
        throw new GameshowError('NotFound', `Player ${name} was not found`);
      }
      state.players.splice(index, 1);
    });

    this.logger.log(`Player ${name} was kicked`);
  }

  /**
   * End betting or opponent selection even if some players have not acted.
   */
  async forceBettingOrSelectingReady(): Promise<void> {
    await this.store.withLocks(['phase'], (state) => {
      if (!isWaiting(state.phase, ['BettingQBetting', 'VersusQSelecting'])) {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not BettingQBetting(false) or VersusQSelecting(false)',
        );
      }
      state.phase = markReady(state.phase);
    });

    this.logger.log('Forced end of betting/selecting');
  }

  /**
   * End answering even if some players have not answered.
   */
  async forceAnsweringReady(): Promise<void> {
    await this.store.withLocks(['phase'], (state) => {
      if (!isWaiting(state.phase, ANSWERING_STATES)) {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not *Answering(false)',
        );
      }
      state.phase = markReady(state.phase);
    });

    this.logger.log('Forced end of answering');
  }

  /**
   * Let the next poll start the next question.
   */
  async requestNextQuestion(): Promise<void> {
    await this.store.withLocks(['phase'], (state) => {
      if (state.phase.name !== 'Results') {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not Results, not ready for the next question',
        );
      }
      state.phase = markReady(state.phase);
    });

    this.logger.log('Next question requested');
  }

  /**
   * Make the next advancement begin question `number` (1-based).
   * Returns the question index before the jump.
   */
  async jumpToQuestion(number: number): Promise<number> {
    const previous = await this.store.withLocks(
      ['phase', 'questions'],
      (state) => {
        if (!isBetweenQuestions(state.phase)) {
          throw new GameshowError(
            'PhaseMismatch',
            'QuestionState is not Results(false) or GameEnding',
          );
        }
        if (
          !Number.isInteger(number) ||
          number < 1 ||
          number > state.questions.length
        ) {
          throw new GameshowError(
            'InvalidInput',
            `Question number must be between 1 and ${state.questions.length}`,
          );
        }

        const index = this.store.swapIndex(number - 1);
        state.phase = waiting('Results');
        return index;
      },
    );

    this.logger.log(`Jumped from question ${previous} to before ${number}`);
    return previous;
  }

  /**
   * Replace the question list and restart from the first question.
   * Returns the number of loaded questions.
   */
  async reloadQuestions(questions: readonly Question[]): Promise<number> {
    await this.store.withLocks(['phase', 'questions'], (state) => {
      if (!isBetweenQuestions(state.phase)) {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not Results(false) or GameEnding',
        );
      }
      state.questions = questions;
      this.store.storeIndex(0);
      state.phase = waiting('Results');
    });

    this.logger.log(`Reloaded ${questions.length} questions`);
    return questions.length;
  }

  /**
   * Load a question file from the questions directory, then reload.
   * The file is read before any lock is taken.
   */
  async loadQuestionFile(filename: string): Promise<number> {
    const questions = await this.questionLoader.loadFromDirectory(filename);
    return this.reloadQuestions(questions);
  }

  /**
   * Add a signed amount to a player's money.
   */
  async giveMoney(name: string, delta: number): Promise<MoneyUpdate> {
    const update = await this.store.withLocks(['players'], (state) => {
      if (!Number.isInteger(delta)) {
        throw new GameshowError('InvalidInput', 'Money must be an integer');
      }
      const player = findPlayer(state.players, name);
      if (player.money + delta < 0) {
        throw new GameshowError(
          'InvalidInput',
          `Player ${name} has only ${player.money}`,
        );
      }
      player.money += delta;
      return { name: player.name, money: player.money };
    });

    this.logger.log(`Player ${name} money changed by ${delta}`);
    return update;
  }

  async setJokers(name: string, jokers: number): Promise<JokersUpdate> {
    const update = await this.store.withLocks(['players'], (state) => {
      if (!Number.isInteger(jokers) || jokers < 0) {
        throw new GameshowError(
          'InvalidInput',
          'Jokers must be a non-negative integer',
        );
      }
      const player = findPlayer(state.players, name);
      player.jokers = jokers;
      return { name: player.name, jokers: player.jokers };
    });

    this.logger.log(`Player ${name} now has ${jokers} jokers`);
    return update;
  }
}
