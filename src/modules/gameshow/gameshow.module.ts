import { Module } from '@nestjs/common';
import { GameshowController } from './gameshow.controller';
import { GameshowGateway } from './gameshow.gateway';
import { GameModule } from '../game/game.module';
import { PlayerModule } from '../player/player.module';
import { ModeratorModule } from '../moderator/moderator.module';

@Module({
  imports: [GameModule, PlayerModule, ModeratorModule],
  controllers: [GameshowController],
  providers: [GameshowGateway],
})
export class GameshowModule {}
