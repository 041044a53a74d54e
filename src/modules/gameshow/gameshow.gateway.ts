import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { Socket } from 'socket.io';
import { GameService } from '../game/game.service';
import { PlayerService } from '../player/player.service';
import { eventsSince } from '../game/event-log';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import {
  GameshowError,
  describeError,
} from '../../common/errors/gameshow.error';
import { GameEvent } from '../../common/interfaces/game-event.interface';
import { PlayerData } from '../../common/interfaces/player.interface';

export type GatewayReply<T> =
  | ({ success: true } & T)
  | { success: false; error: string; message: string };

/**
 * Socket transport for live displays. Polling here has the same effect as
 * GET /api/getGameEvents: it may advance the show.
 */
// CORS for the socket server comes from CorsIoAdapter
@WebSocketGateway({
  transports: ['websocket', 'polling'],
})
@SkipThrottle()
export class GameshowGateway
  implements OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(GameshowGateway.name);

  constructor(
    private readonly gameService: GameService,
    private readonly playerService: PlayerService,
  ) {}

  handleConnection(client: Socket) {
    this.logger.log(`Display connected: ${client.id}`);
    client.emit(GAME_CONFIG.EVENTS.CONNECTED, { clientId: client.id });
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Display disconnected: ${client.id}`);
  }

  /**
   * GET GAME EVENTS - optionally only those with id >= sinceId
   */
  @SubscribeMessage(GAME_CONFIG.EVENTS.GET_GAME_EVENTS)
  async handleGetGameEvents(
    @MessageBody() data: { sinceId?: number } | undefined,
    @ConnectedSocket() client: Pick<Socket, 'id'>,
  ): Promise<GatewayReply<{ events: GameEvent[] }>> {
    try {
      const events = await this.gameService.pollAndAdvance();
      const requested = data?.sinceId;
      const sinceId = typeof requested === 'number' ? requested : 0;
      return { success: true, events: eventsSince(events, sinceId) };
    } catch (error) {
      return this.reject(client, error);
    }
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.GET_PLAYER_DATA)
  async handleGetPlayerData(
    @ConnectedSocket() client: Pick<Socket, 'id'>,
  ): Promise<GatewayReply<{ players: PlayerData[] }>> {
    try {
      const players = await this.playerService.listPlayers();
      return { success: true, players };
    } catch (error) {
      return this.reject(client, error);
    }
  }

  private reject(
    client: Pick<Socket, 'id'>,
    error: unknown,
  ): { success: false; error: string; message: string } {
    const message = describeError(error);
    if (error instanceof GameshowError) {
      this.logger.warn(`Rejected ${client.id} (${error.kind}): ${message}`);
      return { success: false, error: error.kind, message };
    }
    this.logger.error(`Request from ${client.id} failed: ${message}`);
    return { success: false, error: 'InternalError', message };
  }
}
