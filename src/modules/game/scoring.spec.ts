import { makePlayer } from '../../testing/gameshow.fixtures';
import {
  scoreBetting,
  scoreEstimation,
  scoreNormal,
  scoreVersus,
} from './scoring';

const money = (players: { name: string; money: number }[]) =>
  Object.fromEntries(players.map((player) => [player.name, player.money]));

describe('scoring', () => {
  describe('scoreNormal', () => {
    it('rewards only correct answers', () => {
      const players = [
        makePlayer('Ann', { answer: 2 }),
        makePlayer('Bob', { answer: 3 }),
        makePlayer('Cid'),
      ];

      const { playerData } = scoreNormal(players, 2, 500);

      expect(money(playerData)).toEqual({ Ann: 1000, Bob: 500, Cid: 500 });
    });

    it('keeps the input untouched and returns the before snapshot', () => {
      const players = [makePlayer('Ann', { answer: 2 })];

      const { previousPlayerData, playerData } = scoreNormal(players, 2, 500);

      expect(players[0].money).toBe(500);
      expect(previousPlayerData).toEqual([makePlayer('Ann', { answer: 2 })]);
      expect(previousPlayerData[0]).not.toBe(players[0]);
      expect(playerData[0].money).toBe(1000);
    });
  });

  describe('scoreBetting', () => {
    it('adds the bet on a correct answer and floors a zero balance to 1', () => {
      const players = [
        makePlayer('A', { answer: 2, moneyBet: 100 }),
        makePlayer('B', { answer: 1, moneyBet: 500 }),
      ];

      const { playerData } = scoreBetting(players, 2);

      expect(money(playerData)).toEqual({ A: 600, B: 1 });
    });

    it('loses at most the balance when it shrank below the bet', () => {
      const players = [
        makePlayer('A', { money: 100, moneyBet: 500, answer: 1 }),
      ];

      const { playerData } = scoreBetting(players, 2);

      expect(playerData[0].money).toBe(1);
    });

    it('subtracts the bet when the player did not answer', () => {
      const players = [makePlayer('A', { money: 800, moneyBet: 300 })];

      const { playerData } = scoreBetting(players, 4);

      expect(playerData[0].money).toBe(500);
    });
  });

  describe('scoreEstimation', () => {
    it('rewards every player tied for the smallest distance', () => {
      const players = [
        makePlayer('A', { answer: 48 }),
        makePlayer('B', { answer: 52 }),
        makePlayer('C', { answer: 10 }),
      ];

      const { playerData } = scoreEstimation(players, 50, 1000);

      expect(money(playerData)).toEqual({ A: 1500, B: 1500, C: 500 });
    });

    it('treats a missing answer as 0', () => {
      const players = [
        makePlayer('A', { answer: 0 }),
        makePlayer('B', { answer: 9 }),
      ];

      const { playerData } = scoreEstimation(players, 3, 1000);

      expect(money(playerData)).toEqual({ A: 1500, B: 500 });
    });

    it('handles an empty roster', () => {
      expect(scoreEstimation([], 3, 1000)).toEqual({
        previousPlayerData: [],
        playerData: [],
      });
    });
  });

  describe('scoreVersus', () => {
    it("halves the opponent's money when the attacker is right", () => {
      const players = [
        makePlayer('A', { vsPlayer: 'B', answer: 3 }),
        makePlayer('B', { answer: 1 }),
      ];

      const { playerData } = scoreVersus(players, 3);

      expect(money(playerData)).toEqual({ A: 500, B: 250 });
    });

    it("doubles the opponent's money when the attacker is wrong", () => {
      const players = [
        makePlayer('A', { vsPlayer: 'B', answer: 1 }),
        makePlayer('B', { money: 300 }),
      ];

      const { playerData } = scoreVersus(players, 3);

      expect(money(playerData)).toEqual({ A: 500, B: 600 });
    });

    it('composes factors of several attackers from the pre-round balance', () => {
      const players = [
        makePlayer('A', { vsPlayer: 'B', answer: 3 }),
        makePlayer('B', { vsPlayer: 'A', answer: 1 }),
        makePlayer('C', { vsPlayer: 'B', answer: 2 }),
      ];

      const { playerData } = scoreVersus(players, 3);

      // B: 0.5 * 2.0 = 1.0, A: 2.0 from B's wrong answer
      expect(money(playerData)).toEqual({ A: 1000, B: 500, C: 500 });
    });

    it('truncates and floors a zero balance to 1', () => {
      const players = [
        makePlayer('A', { vsPlayer: 'B', answer: 3 }),
        makePlayer('B', { money: 3, vsPlayer: 'C', answer: 3 }),
        makePlayer('C', { money: 1 }),
      ];

      const { playerData } = scoreVersus(players, 3);

      expect(money(playerData)).toEqual({ A: 500, B: 1, C: 1 });
    });

    it('ignores attacks on players who are no longer in the game', () => {
      const players = [makePlayer('A', { vsPlayer: 'Gone', answer: 3 })];

      const { playerData } = scoreVersus(players, 3);

      expect(playerData[0].money).toBe(500);
    });
  });
});
