import { PlayerData } from '../interfaces/player.interface';
import { GameshowError } from '../errors/gameshow.error';

export function clonePlayers(players: readonly PlayerData[]): PlayerData[] {
  return players.map((player) => ({ ...player }));
}

export function findPlayer(players: PlayerData[], name: string): PlayerData {
  const player = players.find((candidate) => candidate.name === name);
  if (!player) {
    throw new GameshowError('NotFound', `Player ${name} was not found`);
  }
  return player;
}
