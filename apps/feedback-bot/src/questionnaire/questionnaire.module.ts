import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { TelegramModule } from '../telegram/telegram.module';
import { NotionModule } from '../notion/notion.module';
import { QuestionnaireService } from './questionnaire.service';

@Module({
  imports: [StoreModule, TelegramModule, NotionModule],
  providers: [QuestionnaireService],
  exports: [QuestionnaireService],
})
export class QuestionnaireModule {}
