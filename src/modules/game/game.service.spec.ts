import { GameEvent } from '../../common/interfaces/game-event.interface';
import { QuestionType } from '../../common/interfaces/question.interface';
import {
  Gameshow,
  NORMAL_QUESTION,
  beginQuestion,
  createGameshow,
  currentState,
} from '../../testing/gameshow.fixtures';

const money = (event: GameEvent | undefined) => {
  if (!event || event.eventName !== 'ShowResults') {
    throw new Error(`Expected ShowResults, got ${String(event?.eventName)}`);
  }
  return Object.fromEntries(
    event.event.playerData.map((player) => [player.name, player.money]),
  );
};

describe('GameService', () => {
  let show: Gameshow;

  beforeEach(async () => {
    show = createGameshow();
    await show.players.join('Ann');
    await show.players.join('Bob');
  });

  describe('pollAndAdvance', () => {
    it('does nothing while no step is ready', async () => {
      await expect(show.game.pollAndAdvance()).resolves.toEqual([]);
      await expect(show.game.pollAndAdvance()).resolves.toEqual([]);
      expect(await currentState(show)).toBe('Results(false)');
    });

    it('begins the first question once the moderator asks for it', async () => {
      await show.moderator.requestNextQuestion();

      const events = await show.game.pollAndAdvance();

      expect(events).toEqual([
        {
          id: 0,
          eventName: 'BeginNormalQAnswering',
          event: {
            questionType: QuestionType.NORMAL,
            currentQuestion: 1,
            category: NORMAL_QUESTION.category,
            question: NORMAL_QUESTION.question,
            answers: [...NORMAL_QUESTION.answers],
          },
        },
      ]);
      expect(await currentState(show)).toBe('NormalQAnswering(false)');
    });

    it('advances only once however often it is polled', async () => {
      await show.moderator.requestNextQuestion();

      await show.game.pollAndAdvance();
      const events = await show.game.pollAndAdvance();

      expect(events).toHaveLength(1);
      expect(show.store.loadIndex()).toBe(1);
    });

    it('advances only once under concurrent polls', async () => {
      await show.moderator.requestNextQuestion();

      await Promise.all([
        show.game.pollAndAdvance(),
        show.game.pollAndAdvance(),
        show.game.pollAndAdvance(),
      ]);

      await expect(show.game.getEvents()).resolves.toHaveLength(1);
      expect(show.store.loadIndex()).toBe(1);
    });
  });

  describe('advance', () => {
    it('returns null when the current step is not ready', async () => {
      await expect(show.game.peekReady()).resolves.toBe(false);
      await expect(show.game.advance()).resolves.toBeNull();
    });

    it('returns the appended event', async () => {
      await show.moderator.requestNextQuestion();
      await expect(show.game.peekReady()).resolves.toBe(true);

      const event = await show.game.advance();

      expect(event?.id).toBe(0);
      expect(event?.eventName).toBe('BeginNormalQAnswering');
      await expect(show.game.peekReady()).resolves.toBe(false);
    });
  });

  describe('normal question', () => {
    it('rewards correct answers and returns to results', async () => {
      await beginQuestion(show, 1);
      await show.players.submitAnswer('Ann', 2);
      await show.players.submitAnswer('Bob', 1);

      const events = await show.game.pollAndAdvance();
      const results = events[1];

      expect(results.eventName).toBe('ShowResults');
      expect(money(results)).toEqual({ Ann: 1000, Bob: 500 });
      if (results.eventName === 'ShowResults') {
        expect(results.event.correctAnswer).toBe(2);
        expect(
          results.event.previousPlayerData.map((player) => player.money),
        ).toEqual([500, 500]);
      }
      expect(await currentState(show)).toBe('Results(false)');
    });

    it('uses the configured reward', async () => {
      show = createGameshow(undefined, { NORMAL_Q_MONEY: '250' });
      await show.players.join('Ann');
      await beginQuestion(show, 1);
      await show.players.submitAnswer('Ann', 2);

      const events = await show.game.pollAndAdvance();

      expect(money(events[1])).toEqual({ Ann: 750 });
    });

    it('shares no mutable state with readers of the log', async () => {
      await beginQuestion(show, 1);
      await show.moderator.forceAnsweringReady();
      const [, results] = await show.game.pollAndAdvance();

      expect(results.eventName).toBe('ShowResults');
      if (results.eventName === 'ShowResults') {
        expect(() => {
          results.event.playerData[0].money = 0;
        }).toThrow(TypeError);
      }
      expect(money((await show.game.getEvents())[1])).toEqual({
        Ann: 500,
        Bob: 500,
      });
    });
  });

  describe('betting question', () => {
    it('runs betting, answering and settlement', async () => {
      await beginQuestion(show, 2);
      expect(await currentState(show)).toBe('BettingQBetting(false)');

      await show.players.placeBet('Ann', 100);
      await show.players.placeBet('Bob', 500);
      const afterBets = await show.game.pollAndAdvance();

      expect(afterBets[1]).toEqual({
        id: 1,
        eventName: 'BeginBettingQAnswering',
        event: {
          question: 'Which planet has the shortest day?',
          answers: ['Mars', 'Jupiter', 'Venus', 'Mercury'],
        },
      });

      await show.players.submitAnswer('Ann', 2);
      await show.players.submitAnswer('Bob', 1);
      const events = await show.game.pollAndAdvance();

      expect(money(events[2])).toEqual({ Ann: 600, Bob: 1 });
    });

    it('keeps a balance lowered after betting from going negative', async () => {
      await beginQuestion(show, 2);
      await show.players.placeBet('Ann', 500);
      await show.players.placeBet('Bob', 100);
      await show.moderator.giveMoney('Ann', -400);
      await show.game.pollAndAdvance();

      await show.players.submitAnswer('Ann', 1);
      await show.players.submitAnswer('Bob', 2);
      const events = await show.game.pollAndAdvance();

      expect(money(events[2])).toEqual({ Ann: 1, Bob: 600 });
    });

    it('announces the category before the question', async () => {
      await beginQuestion(show, 2);

      const events = await show.game.getEvents();

      expect(events).toEqual([
        {
          id: 0,
          eventName: 'BeginBettingQBetting',
          event: {
            questionType: QuestionType.BETTING,
            currentQuestion: 2,
            category: 'Science',
          },
        },
      ]);
    });
  });

  describe('estimation question', () => {
    it('rewards all players tied for the closest estimate', async () => {
      await show.players.join('Cid');
      await beginQuestion(show, 3);
      await show.players.submitAnswer('Ann', 48);
      await show.players.submitAnswer('Bob', 52);
      await show.players.submitAnswer('Cid', 10);

      const events = await show.game.pollAndAdvance();

      expect(events[0].eventName).toBe('BeginEstimationQAnswering');
      expect(money(events[1])).toEqual({ Ann: 1500, Bob: 1500, Cid: 500 });
    });
  });

  describe('versus question', () => {
    it('selects opponents, answers and applies the factors at once', async () => {
      await show.players.join('Cid');
      await beginQuestion(show, 4);
      await show.players.selectOpponent('Ann', 'Bob');
      await show.players.selectOpponent('Bob', 'Ann');
      await show.players.selectOpponent('Cid', 'Bob');

      const selecting = await show.game.pollAndAdvance();
      expect(selecting.map((event) => event.eventName)).toEqual([
        'BeginVersusQSelecting',
        'BeginVersusQAnswering',
      ]);

      await show.players.submitAnswer('Ann', 3);
      await show.players.submitAnswer('Bob', 1);
      await show.players.submitAnswer('Cid', 1);
      const events = await show.game.pollAndAdvance();

      expect(money(events[2])).toEqual({ Ann: 1000, Bob: 500, Cid: 500 });
    });
  });

  describe('between questions', () => {
    it('clears bets, opponents and answers when a question begins', async () => {
      await beginQuestion(show, 2);
      await show.players.placeBet('Ann', 100);
      await show.players.placeBet('Bob', 200);
      await show.game.pollAndAdvance();
      await show.players.submitAnswer('Ann', 2);
      await show.moderator.forceAnsweringReady();
      await show.game.pollAndAdvance();

      await show.moderator.requestNextQuestion();
      await show.game.pollAndAdvance();

      const players = await show.players.listPlayers();
      expect(
        players.map(({ moneyBet, vsPlayer, answer }) => ({
          moneyBet,
          vsPlayer,
          answer,
        })),
      ).toEqual([
        { moneyBet: 0, vsPlayer: '', answer: 0 },
        { moneyBet: 0, vsPlayer: '', answer: 0 },
      ]);
      expect(await currentState(show)).toBe('EstimationQAnswering(false)');
    });

    it('ends the game after the last question', async () => {
      show = createGameshow([NORMAL_QUESTION]);
      await show.players.join('Ann');
      await beginQuestion(show, 1);
      await show.players.submitAnswer('Ann', 2);
      await show.game.pollAndAdvance();

      await show.moderator.requestNextQuestion();
      const events = await show.game.pollAndAdvance();

      expect(events[2]).toEqual({
        id: 2,
        eventName: 'GameEnding',
        event: {
          playerData: [
            {
              name: 'Ann',
              jokers: 3,
              money: 1000,
              moneyBet: 0,
              vsPlayer: '',
              answer: 2,
            },
          ],
        },
      });
      expect(await currentState(show)).toBe('GameEnding');
      await expect(show.game.pollAndAdvance()).resolves.toHaveLength(3);
    });

    it('numbers every event in order without gaps', async () => {
      for (const number of [1, 2, 3, 4]) {
        await beginQuestion(show, number);
        for (let step = 0; step < 2; step++) {
          const status = await show.game.getStatus();
          if (status.state.startsWith('Results')) {
            break;
          }
          if (
            status.state === 'BettingQBetting(false)' ||
            status.state === 'VersusQSelecting(false)'
          ) {
            await show.moderator.forceBettingOrSelectingReady();
          } else {
            await show.moderator.forceAnsweringReady();
          }
          await show.game.pollAndAdvance();
        }
      }

      const events = await show.game.getEvents();
      expect(events.map((event) => event.id)).toEqual(
        events.map((_, index) => index),
      );
      expect(events).toHaveLength(10);
    });
  });

  it('reports its status', async () => {
    await beginQuestion(show, 1);

    await expect(show.game.getStatus()).resolves.toEqual({
      state: 'NormalQAnswering(false)',
      currentQuestion: 1,
      totalQuestions: 4,
      players: 2,
      events: 1,
    });
  });
});
