import { Module } from '@nestjs/common';
import { QuestionLoaderService } from './question-loader.service';

@Module({
  providers: [QuestionLoaderService],
  exports: [QuestionLoaderService],
})
export class QuestionsModule {}
