import { PlayerData } from './player.interface';
import { QuestionType } from './question.interface';

export interface BeginNormalQAnswering {
  questionType: QuestionType;
  currentQuestion: number;
  category: string;
  question: string;
  answers: string[];
}

export interface BeginBettingQBetting {
  questionType: QuestionType;
  currentQuestion: number;
  category: string;
}

export interface BeginBettingQAnswering {
  question: string;
  answers: string[];
}

export interface BeginEstimationQAnswering {
  questionType: QuestionType;
  currentQuestion: number;
  category: string;
  question: string;
}

export interface BeginVersusQSelecting {
  questionType: QuestionType;
  currentQuestion: number;
  category: string;
}

export interface BeginVersusQAnswering {
  question: string;
  answers: string[];
}

export interface ShowResults {
  correctAnswer: number;
  previousPlayerData: PlayerData[];
  playerData: PlayerData[];
}

export interface GameEnding {
  playerData: PlayerData[];
}

export type GameEventPayload =
  | { eventName: 'BeginNormalQAnswering'; event: BeginNormalQAnswering }
  | { eventName: 'BeginBettingQBetting'; event: BeginBettingQBetting }
  | { eventName: 'BeginBettingQAnswering'; event: BeginBettingQAnswering }
  | {
      eventName: 'BeginEstimationQAnswering';
      event: BeginEstimationQAnswering;
    }
  | { eventName: 'BeginVersusQSelecting'; event: BeginVersusQSelecting }
  | { eventName: 'BeginVersusQAnswering'; event: BeginVersusQAnswering }
  | { eventName: 'ShowResults'; event: ShowResults }
  | { eventName: 'GameEnding'; event: GameEnding };

export type GameEventName = GameEventPayload['eventName'];

export type GameEvent = GameEventPayload & { readonly id: number };
