import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GameshowConfigModule } from './config/gameshow-config.module';
import { GameshowModule } from './modules/gameshow/gameshow.module';
import { GameModule } from './modules/game/game.module';
import { RateLimitModule } from './modules/rate-limit/rate-limit.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    GameshowConfigModule,
    GameModule,
    GameshowModule,
    RateLimitModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
