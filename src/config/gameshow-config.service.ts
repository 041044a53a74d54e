import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GAME_CONFIG } from '../common/constants/game.constants';

/**
 * Typed view over the environment. Values that are missing or do not parse
 * as integers fall back to the defaults in GAME_CONFIG.
 */
@Injectable()
export class GameshowConfigService {
  constructor(private readonly configService: ConfigService) {}

  get port(): number {
    return this.getInt('PORT', GAME_CONFIG.PORT);
  }

  get corsOrigin(): string {
    return this.configService.get<string>('CORS_ORIGIN', GAME_CONFIG.CORS_ORIGIN);
  }

  get questionsDir(): string {
    return this.configService.get<string>(
      'QUESTIONS_DIR',
      GAME_CONFIG.QUESTIONS_DIR,
    );
  }

  get questionsFile(): string {
    return this.configService.get<string>(
      'QUESTIONS_FILE',
      GAME_CONFIG.QUESTIONS_FILE,
    );
  }

  get initialMoney(): number {
    return this.getInt('INITIAL_MONEY', GAME_CONFIG.INITIAL_MONEY);
  }

  get initialJokers(): number {
    return this.getInt('INITIAL_JOKERS', GAME_CONFIG.INITIAL_JOKERS);
  }

  get normalQuestionMoney(): number {
    return this.getInt('NORMAL_Q_MONEY', GAME_CONFIG.NORMAL_Q_MONEY);
  }

  get estimationQuestionMoney(): number {
    return this.getInt('ESTIMATION_Q_MONEY', GAME_CONFIG.ESTIMATION_Q_MONEY);
  }

  get throttleTtl(): number {
    return this.getInt('THROTTLE_TTL', GAME_CONFIG.THROTTLE_TTL);
  }

  get throttleLimit(): number {
    return this.getInt('THROTTLE_LIMIT', GAME_CONFIG.THROTTLE_LIMIT);
  }

  private getInt(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined) {
      return fallback;
    }
    if (typeof raw === 'number') {
      return Number.isInteger(raw) ? raw : fallback;
    }
    if (raw.trim() === '') {
      return fallback;
    }
    const parsed = Number(raw);
    return Number.isInteger(parsed) ? parsed : fallback;
  }
}
