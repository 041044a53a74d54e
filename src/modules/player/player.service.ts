import { Injectable, Logger } from '@nestjs/common';
import { GameshowStore } from '../store/gameshow.store';
import { GameshowConfigService } from '../../config/gameshow-config.service';
import { GameshowError } from '../../common/errors/gameshow.error';
import { PlayerData } from '../../common/interfaces/player.interface';
import { clonePlayers, findPlayer } from '../../common/utils/player.utils';
import {
  ANSWERING_STATES,
  isWaiting,
  markReady,
} from '../../common/interfaces/question-state.interface';

/**
 * Actions players take during the show. Each one checks the current state,
 * records the player's input and flips the state to ready once every player
 * has done the same.
 */
@Injectable()
export class PlayerService {
  private readonly logger = new Logger(PlayerService.name);

  constructor(
    private readonly store: GameshowStore,
    private readonly config: GameshowConfigService,
  ) {}

  /**
   * Register a player. Joining again with the same (trimmed) name is a no-op.
   * Returns the trimmed name.
   */
  async join(name: string): Promise<string> {
    const trimmedName = name.trim();
    if (trimmedName === '') {
      throw new GameshowError('InvalidInput', 'Empty name is not allowed');
    }

    const joined = await this.store.withLocks(['players'], (state) => {
      if (state.players.some((player) => player.name === trimmedName)) {
        return false;
      }
      state.players.push({
        name: trimmedName,
        jokers: this.config.initialJokers,
        money: this.config.initialMoney,
        moneyBet: 0,
        vsPlayer: '',
        answer: 0,
      });
      return true;
    });

    if (joined) {
      this.logger.log(`Player ${trimmedName} joined`);
    }
    return trimmedName;
  }

  async listPlayers(): Promise<PlayerData[]> {
    return this.store.withLocks(['players'], (state) =>
      clonePlayers(state.players),
    );
  }

  async placeBet(name: string, amount: number): Promise<void> {
    await this.store.withLocks(['phase', 'players'], (state) => {
      if (!isWaiting(state.phase, ['BettingQBetting'])) {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not BettingQBetting(false)',
        );
      }
      if (!Number.isInteger(amount) || amount < 1) {
        throw new GameshowError('InvalidInput', 'Bet must be at least 1');
      }

      const player = findPlayer(state.players, name);
      if (amount > player.money) {
        throw new GameshowError(
          'InvalidInput',
          `Bet of ${amount} exceeds ${player.money} available`,
        );
      }
      player.moneyBet = amount;

      if (state.players.every((other) => other.moneyBet >= 1)) {
        state.phase = markReady(state.phase);
      }
    });

    this.logger.log(`Player ${name} bet ${amount}`);
  }

  async selectOpponent(name: string, target: string): Promise<void> {
    await this.store.withLocks(['phase', 'players'], (state) => {
      if (!isWaiting(state.phase, ['VersusQSelecting'])) {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not VersusQSelecting(false)',
        );
      }
      if (name === target) {
        throw new GameshowError(
          'InvalidInput',
          'Players cannot select themselves',
        );
      }

      const player = findPlayer(state.players, name);
      findPlayer(state.players, target);
      player.vsPlayer = target;

      if (state.players.every((other) => other.vsPlayer !== '')) {
        state.phase = markReady(state.phase);
      }
    });

    this.logger.log(`Player ${name} selected ${target}`);
  }

  async submitAnswer(name: string, answer: number): Promise<void> {
    await this.store.withLocks(['phase', 'players'], (state) => {
      if (!isWaiting(state.phase, ANSWERING_STATES)) {
        throw new GameshowError(
          'PhaseMismatch',
          'QuestionState is not *Answering(false)',
        );
      }
      if (!Number.isInteger(answer) || answer < 1) {
        throw new GameshowError('InvalidInput', 'Answer must be at least 1');
      }

      const player = findPlayer(state.players, name);
      player.answer = answer;

      if (state.players.every((other) => other.answer >= 1)) {
        state.phase = markReady(state.phase);
      }
    });

    this.logger.log(`Player ${name} answered`);
  }

  /**
   * Spend a joker and get two wrong options of the current question.
   */
  async requestFiftyFifty(name: string): Promise<number[]> {
    const wrongAnswers = await this.store.withLocks(
      ['phase', 'questions', 'players'],
      (state) => {
        if (
          !isWaiting(state.phase, ['NormalQAnswering', 'BettingQAnswering'])
        ) {
          throw new GameshowError(
            'PhaseMismatch',
            'QuestionState is not NormalQAnswering(false) or BettingQAnswering(false)',
          );
        }

        const player = findPlayer(state.players, name);
        if (player.jokers < 1) {
          throw new GameshowError('NoJokersLeft', 'No jokers available');
        }

        const question = this.store.questionAt(state.questions);
        const wrong = this.pickWrongAnswers(
          question.answers.length,
          question.correctAnswer,
        );
        player.jokers -= 1;
        return wrong;
      },
    );

    this.logger.log(`Player ${name} used a fifty-fifty joker`);
    return wrongAnswers;
  }

  /**
   * Two distinct wrong option indices (1-based), drawn at random.
   */
  private pickWrongAnswers(optionCount: number, correctAnswer: number): number[] {
    const candidates: number[] = [];
    for (let option = 1; option <= optionCount; option++) {
      if (option !== correctAnswer) {
        candidates.push(option);
      }
    }

    // Partial Fisher-Yates over the first two slots
    const picks = Math.min(2, candidates.length);
    for (let i = 0; i < picks; i++) {
      const j = i + Math.floor(Math.random() * (candidates.length - i));
      [candidates[i], candidates[j]] = [candidates[j], candidates[i]];
    }
    return candidates.slice(0, picks);
  }
}
