import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  UseFilters,
} from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { GameService } from '../game/game.service';
import { PlayerService } from '../player/player.service';
import {
  JokersUpdate,
  ModeratorService,
  MoneyUpdate,
} from '../moderator/moderator.service';
import { GameshowExceptionFilter } from '../../common/filters/gameshow-exception.filter';
import { GameEvent } from '../../common/interfaces/game-event.interface';
import { PlayerData } from '../../common/interfaces/player.interface';
import {
  AnswerQuestionDto,
  AttackPlayerDto,
  BetMoneyDto,
  PlayerNameDto,
} from './dto/player-action.dto';
import {
  GiveMoneyDto,
  LoadQuestionsDto,
  SetJokersDto,
  SetNextQuestionDto,
} from './dto/moderator-action.dto';

@Controller('api')
@UseFilters(GameshowExceptionFilter)
export class GameshowController {
  constructor(
    private readonly gameService: GameService,
    private readonly playerService: PlayerService,
    private readonly moderatorService: ModeratorService,
  ) {}

  /**
   * EVENT POLL - advances the show when the current step is ready
   */
  @Get('getGameEvents')
  @SkipThrottle()
  async getGameEvents(): Promise<GameEvent[]> {
    return this.gameService.pollAndAdvance();
  }

  // Player actions

  @Get('joinPlayer')
  async joinPlayer(@Query() query: PlayerNameDto): Promise<string> {
    return this.playerService.join(query.name);
  }

  @Get('getPlayerData')
  async getPlayerData(): Promise<PlayerData[]> {
    return this.playerService.listPlayers();
  }

  @Get('betMoney')
  async betMoney(@Query() query: BetMoneyDto): Promise<void> {
    await this.playerService.placeBet(query.name, query.money_bet);
  }

  @Get('attackPlayer')
  async attackPlayer(@Query() query: AttackPlayerDto): Promise<void> {
    await this.playerService.selectOpponent(query.name, query.vs_player);
  }

  @Get('answerQuestion')
  async answerQuestion(@Query() query: AnswerQuestionDto): Promise<void> {
    await this.playerService.submitAnswer(query.name, query.answer);
  }

  @Get('getJokerFiftyFifty')
  async getJokerFiftyFifty(@Query() query: PlayerNameDto): Promise<number[]> {
    return this.playerService.requestFiftyFifty(query.name);
  }

  // Moderator actions

  @Post('giveMoney')
  @HttpCode(HttpStatus.OK)
  async giveMoney(@Body() body: GiveMoneyDto): Promise<MoneyUpdate> {
    return this.moderatorService.giveMoney(body.name, body.money);
  }

  @Post('setJokers')
  @HttpCode(HttpStatus.OK)
  async setJokers(@Body() body: SetJokersDto): Promise<JokersUpdate> {
    return this.moderatorService.setJokers(body.name, body.jokers);
  }

  @Get('kickPlayer')
  async kickPlayer(@Query() query: PlayerNameDto): Promise<void> {
    await this.moderatorService.kick(query.name);
  }

  @Get('activateNextQuestion')
  async activateNextQuestion(): Promise<void> {
    await this.moderatorService.requestNextQuestion();
  }

  @Get('forceQuestionAnswering')
  async forceQuestionAnswering(): Promise<void> {
    await this.moderatorService.forceBettingOrSelectingReady();
  }

  @Get('forceQuestionResults')
  async forceQuestionResults(): Promise<void> {
    await this.moderatorService.forceAnsweringReady();
  }

  @Get('setNextQuestion')
  async setNextQuestion(@Query() query: SetNextQuestionDto): Promise<string> {
    const previous = await this.moderatorService.jumpToQuestion(query.number);
    return String(previous);
  }

  @Post('loadQuestions')
  @HttpCode(HttpStatus.OK)
  async loadQuestions(@Body() body: LoadQuestionsDto): Promise<string> {
    const count = await this.moderatorService.loadQuestionFile(body.filename);
    return String(count);
  }
}
