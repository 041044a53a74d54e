export interface PlayerData {
  name: string;
  jokers: number;
  money: number;
  // Zero / empty mean "not set for the current question"
  moneyBet: number;
  vsPlayer: string;
  answer: number;
}
