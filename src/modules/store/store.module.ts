import { Module } from '@nestjs/common';
import { GameshowStore } from './gameshow.store';
import { QuestionsModule } from '../questions/questions.module';
import { QuestionLoaderService } from '../questions/question-loader.service';
import { GameshowConfigService } from '../../config/gameshow-config.service';

@Module({
  imports: [QuestionsModule],
  providers: [
    {
      provide: GameshowStore,
      // A missing or broken initial question file aborts bootstrap
      useFactory: async (
        loader: QuestionLoaderService,
        config: GameshowConfigService,
      ) => new GameshowStore(await loader.load(config.questionsFile)),
      inject: [QuestionLoaderService, GameshowConfigService],
    },
  ],
  exports: [GameshowStore],
})
export class StoreModule {}
