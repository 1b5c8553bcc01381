import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { NotionModule } from '../notion/notion.module';
import { TelegramModule } from '../telegram/telegram.module';
import { QuestionnaireModule } from '../questionnaire/questionnaire.module';
import { ReminderService } from './reminder.service';

@Module({
  imports: [StoreModule, NotionModule, TelegramModule, QuestionnaireModule],
  providers: [ReminderService],
})
export class ReminderModule {}
