import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { NotionModule } from '../notion/notion.module';
import { TelegramModule } from '../telegram/telegram.module';
import { QuestionnaireModule } from '../questionnaire/questionnaire.module';
import { DiscoveryService } from './discovery.service';

@Module({
  imports: [StoreModule, NotionModule, TelegramModule, QuestionnaireModule],
  providers: [DiscoveryService],
})
export class DiscoveryModule {}
