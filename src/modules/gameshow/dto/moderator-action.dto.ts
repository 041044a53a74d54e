import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString } from 'class-validator';
import { PlayerNameDto } from './player-action.dto';

export class GiveMoneyDto extends PlayerNameDto {
  @IsInt()
  money!: number;
}

export class SetJokersDto extends PlayerNameDto {
  @IsInt()
  jokers!: number;
}

export class SetNextQuestionDto {
  @Type(() => Number)
  @IsInt()
  number!: number;
}

export class LoadQuestionsDto {
  @IsString()
  @IsNotEmpty()
  filename!: string;
}
