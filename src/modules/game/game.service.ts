import { Injectable, Logger } from '@nestjs/common';
import { GameshowStore, LockedState } from '../store/gameshow.store';
import { GameshowConfigService } from '../../config/gameshow-config.service';
import {
  Question,
  QuestionType,
} from '../../common/interfaces/question.interface';
import {
  GameEvent,
  GameEventPayload,
} from '../../common/interfaces/game-event.interface';
import {
  QuestionState,
  describeState,
  isReady,
  waiting,
} from '../../common/interfaces/question-state.interface';
import { clonePlayers } from '../../common/utils/player.utils';
import { appendEvent } from './event-log';
import {
  Settlement,
  scoreBetting,
  scoreEstimation,
  scoreNormal,
  scoreVersus,
} from './scoring';

type AdvanceState = LockedState<'phase' | 'questions' | 'players' | 'events'>;

interface Transition {
  payload: GameEventPayload;
  next: QuestionState;
}

export interface GameStatus {
  state: string;
  currentQuestion: number;
  totalQuestions: number;
  players: number;
  events: number;
}

/**
 * Phase machine of the show. Nothing here runs on a timer: every transition
 * happens inside `advance`, which the event poll calls.
 */
@Injectable()
export class GameService {
  private readonly logger = new Logger(GameService.name);

  constructor(
    private readonly store: GameshowStore,
    private readonly config: GameshowConfigService,
  ) {}

  /**
   * Advance if ready, then return the whole event log.
   */
  async pollAndAdvance(): Promise<GameEvent[]> {
    if (await this.peekReady()) {
      await this.advance();
    }
    return this.getEvents();
  }

  async peekReady(): Promise<boolean> {
    return this.store.withLocks(['phase'], (state) => isReady(state.phase));
  }

  /**
   * Perform at most one transition. Returns the appended event, or null when
   * the current state is not ready.
   */
  async advance(): Promise<GameEvent | null> {
    return this.store.withLocks(
      ['phase', 'questions', 'players', 'events'],
      (state) => {
        const transition = this.transition(state);
        if (!transition) {
          return null;
        }

        const event = appendEvent(state.events, transition.payload);
        state.phase = transition.next;

        this.logger.log(
          `Event ${event.id} ${event.eventName}, now ${describeState(state.phase)}`,
        );
        return event;
      },
    );
  }

  async getEvents(): Promise<GameEvent[]> {
    return this.store.withLocks(['events'], (state) => [...state.events]);
  }

  async getStatus(): Promise<GameStatus> {
    return this.store.withLocks(
      ['phase', 'questions', 'players', 'events'],
      (state) => ({
        state: describeState(state.phase),
        currentQuestion: this.store.loadIndex(),
        totalQuestions: state.questions.length,
        players: state.players.length,
        events: state.events.length,
      }),
    );
  }

  private transition(state: AdvanceState): Transition | null {
    const phase = state.phase;
    if (!isReady(phase)) {
      return null;
    }

    switch (phase.name) {
      case 'Results':
        return this.beginNextQuestion(state);

      case 'BettingQBetting': {
        const question = this.currentQuestion(state);
        return {
          payload: {
            eventName: 'BeginBettingQAnswering',
            event: {
              question: question.question,
              answers: [...question.answers],
            },
          },
          next: waiting('BettingQAnswering'),
        };
      }

      case 'VersusQSelecting': {
        const question = this.currentQuestion(state);
        return {
          payload: {
            eventName: 'BeginVersusQAnswering',
            event: {
              question: question.question,
              answers: [...question.answers],
            },
          },
          next: waiting('VersusQAnswering'),
        };
      }

      case 'NormalQAnswering':
        return this.showResults(state, (question) =>
          scoreNormal(
            state.players,
            question.correctAnswer,
            this.config.normalQuestionMoney,
          ),
        );

      case 'BettingQAnswering':
        return this.showResults(state, (question) =>
          scoreBetting(state.players, question.correctAnswer),
        );

      case 'EstimationQAnswering':
        return this.showResults(state, (question) =>
          scoreEstimation(
            state.players,
            question.correctAnswer,
            this.config.estimationQuestionMoney,
          ),
        );

      case 'VersusQAnswering':
        return this.showResults(state, (question) =>
          scoreVersus(state.players, question.correctAnswer),
        );
    }
  }

  private beginNextQuestion(state: AdvanceState): Transition {
    const currentQuestion = this.store.fetchAddIndex(1) + 1;

    if (currentQuestion > state.questions.length) {
      return {
        payload: {
          eventName: 'GameEnding',
          event: { playerData: clonePlayers(state.players) },
        },
        next: { name: 'GameEnding' },
      };
    }

    for (const player of state.players) {
      player.moneyBet = 0;
      player.vsPlayer = '';
      player.answer = 0;
    }

    const question = state.questions[currentQuestion - 1];
    const { questionType, category } = question;

    switch (questionType) {
      case QuestionType.NORMAL:
        return {
          payload: {
            eventName: 'BeginNormalQAnswering',
            event: {
              questionType,
              currentQuestion,
              category,
              question: question.question,
              answers: [...question.answers],
            },
          },
          next: waiting('NormalQAnswering'),
        };
      case QuestionType.BETTING:
        return {
          payload: {
            eventName: 'BeginBettingQBetting',
            event: { questionType, currentQuestion, category },
          },
          next: waiting('BettingQBetting'),
        };
      case QuestionType.ESTIMATION:
        return {
          payload: {
            eventName: 'BeginEstimationQAnswering',
            event: {
              questionType,
              currentQuestion,
              category,
              question: question.question,
            },
          },
          next: waiting('EstimationQAnswering'),
        };
      case QuestionType.VERSUS:
        return {
          payload: {
            eventName: 'BeginVersusQSelecting',
            event: { questionType, currentQuestion, category },
          },
          next: waiting('VersusQSelecting'),
        };
    }
  }

  private showResults(
    state: AdvanceState,
    score: (question: Question) => Settlement,
  ): Transition {
    const question = this.currentQuestion(state);
    const settlement = score(question);
    state.players = clonePlayers(settlement.playerData);

    return {
      payload: {
        eventName: 'ShowResults',
        event: {
          correctAnswer: question.correctAnswer,
          previousPlayerData: settlement.previousPlayerData,
          playerData: settlement.playerData,
        },
      },
      next: waiting('Results'),
    };
  }

  private currentQuestion(state: AdvanceState): Question {
    return this.store.questionAt(state.questions);
  }
}
