import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';
import { GameshowConfigService } from './config/gameshow-config.service';
import { describeError } from './common/errors/gameshow.error';
import { CorsIoAdapter } from './common/adapters/cors-io.adapter';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(GameshowConfigService);

  app.enableCors({
    origin: config.corsOrigin,
    credentials: true,
  });
  app.useWebSocketAdapter(new CorsIoAdapter(app, config.corsOrigin));

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  const port = config.port;
  await app.listen(port);

  logger.log(`🚀 Gameshow running on http://localhost:${port}`);
  logger.log(`🔌 Event polling at /api/getGameEvents and over WebSocket`);
  logger.log(`📭 CORS allowed for: ${config.corsOrigin}`);
}

// Without questions there is no show: a failed initial load ends the process
bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start: ${describeError(error)}`);
  process.exit(1);
});
