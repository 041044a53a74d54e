export enum QuestionType {
  NORMAL = 'NormalQuestion',
  BETTING = 'BettingQuestion',
  ESTIMATION = 'EstimationQuestion',
  VERSUS = 'VersusQuestion',
}

export interface Question {
  readonly questionType: QuestionType;
  readonly category: string;
  readonly question: string;
  readonly answers: readonly string[];
  /**
   * 1-based option index for normal, betting and versus questions;
   * the exact numeric value for estimation questions.
   */
  readonly correctAnswer: number;
}
