import { Global, Module } from '@nestjs/common';
import { GameshowConfigService } from './gameshow-config.service';

@Global()
@Module({
  providers: [GameshowConfigService],
  exports: [GameshowConfigService],
})
export class GameshowConfigModule {}
