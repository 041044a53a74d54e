import { Module } from '@nestjs/common';
import { ModeratorService } from './moderator.service';
import { StoreModule } from '../store/store.module';
import { QuestionsModule } from '../questions/questions.module';

@Module({
  imports: [StoreModule, QuestionsModule],
  providers: [ModeratorService],
  exports: [ModeratorService],
})
export class ModeratorModule {}
