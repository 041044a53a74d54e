import {
  IsArray,
  IsEnum,
  IsInt,
  IsString,
  Min,
} from 'class-validator';
import { QuestionType } from '../../../common/interfaces/question.interface';

/**
 * One entry of a question file, as written on disk.
 */
export class QuestionRecordDto {
  @IsEnum(QuestionType)
  question_type!: QuestionType;

  @IsString()
  category!: string;

  @IsString()
  question!: string;

  @IsArray()
  @IsString({ each: true })
  answers!: string[];

  @IsInt()
  @Min(0)
  correct_answer!: number;
}
