import { Controller, Get } from '@nestjs/common';
import { GameService } from './modules/game/game.service';

@Controller()
export class AppController {
  constructor(private readonly gameService: GameService) {}

  @Get('/health')
  async healthCheck() {
    const game = await this.gameService.getStatus();
    return {
      status: 'healthy',
      game,
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    };
  }
}
