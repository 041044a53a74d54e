import { Module } from '@nestjs/common';
import { GameService } from './game.service';
import { StoreModule } from '../store/store.module';

@Module({
  imports: [StoreModule],
  providers: [GameService],
  exports: [GameService],
})
export class GameModule {}
