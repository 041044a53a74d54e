import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString } from 'class-validator';

export class PlayerNameDto {
  @IsString()
  @IsNotEmpty()
  name!: string;
}

export class BetMoneyDto extends PlayerNameDto {
  @Type(() => Number)
  @IsInt()
  money_bet!: number;
}

export class AttackPlayerDto extends PlayerNameDto {
  @IsString()
  @IsNotEmpty()
  vs_player!: string;
}

export class AnswerQuestionDto extends PlayerNameDto {
  @Type(() => Number)
  @IsInt()
  answer!: number;
}
