import { PlayerData } from '../../common/interfaces/player.interface';
import { clonePlayers } from '../../common/utils/player.utils';
import { GAME_CONFIG } from '../../common/constants/game.constants';

export interface Settlement {
  previousPlayerData: PlayerData[];
  playerData: PlayerData[];
}

// Nobody drops out of the game for being broke
function keepInGame(money: number): number {
  return money === 0 ? 1 : money;
}

function settle(
  players: readonly PlayerData[],
  apply: (player: PlayerData, index: number) => void,
): Settlement {
  const previousPlayerData = clonePlayers(players);
  const playerData = clonePlayers(players);
  playerData.forEach(apply);
  return { previousPlayerData, playerData };
}

/**
 * Every correct answer earns the fixed reward.
 */
export function scoreNormal(
  players: readonly PlayerData[],
  correctAnswer: number,
  reward: number,
): Settlement {
  return settle(players, (player) => {
    if (player.answer === correctAnswer) {
      player.money += reward;
    }
  });
}

/**
 * Correct answers win the bet, wrong answers lose it. A loss never takes more
 * than the balance, which can have shrunk since the bet was placed.
 */
export function scoreBetting(
  players: readonly PlayerData[],
  correctAnswer: number,
): Settlement {
  return settle(players, (player) => {
    if (player.answer === correctAnswer) {
      player.money += player.moneyBet;
    } else {
      player.money = Math.max(0, player.money - player.moneyBet);
    }
    player.money = keepInGame(player.money);
  });
}

/**
 * All players closest to the correct value (ties included) earn the reward.
 * A player without an answer counts as having answered 0.
 */
export function scoreEstimation(
  players: readonly PlayerData[],
  correctAnswer: number,
  reward: number,
): Settlement {
  const distances = players.map((player) =>
    Math.abs(player.answer - correctAnswer),
  );
  const closest = Math.min(...distances);

  return settle(players, (player, index) => {
    if (distances[index] === closest) {
      player.money += reward;
    }
  });
}

/**
 * Multiply each attacked player's money by 0.5 per attacker who answered
 * correctly and by 2 per attacker who did not. Factors come from the
 * pre-round state and are applied together, so attack order is irrelevant.
 * The attacker's own money is untouched.
 */
export function scoreVersus(
  players: readonly PlayerData[],
  correctAnswer: number,
): Settlement {
  const factors = players.map(() => 1);

  for (const attacker of players) {
    if (attacker.vsPlayer === '') {
      continue;
    }
    const target = players.findIndex(
      (player) => player.name === attacker.vsPlayer,
    );
    if (target === -1) {
      continue;
    }
    factors[target] *=
      attacker.answer === correctAnswer
        ? GAME_CONFIG.VERSUS_WIN_FACTOR
        : GAME_CONFIG.VERSUS_LOSS_FACTOR;
  }

  return settle(players, (player, index) => {
    player.money = keepInGame(Math.trunc(player.money * factors[index]));
  });
}
