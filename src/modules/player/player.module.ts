import { Module } from '@nestjs/common';
import { PlayerService } from './player.service';
import { StoreModule } from '../store/store.module';

@Module({
  imports: [StoreModule],
  providers: [PlayerService],
  exports: [PlayerService],
})
export class PlayerModule {}
