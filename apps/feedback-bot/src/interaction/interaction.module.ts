import { Module } from '@nestjs/common';
import { TelegramModule } from '../telegram/telegram.module';
import { QuestionnaireModule } from '../questionnaire/questionnaire.module';
import { InteractionService } from './interaction.service';
import { CallbackQueryHandler } from './handlers/callback-query.handler';
import { CommandHandler } from './handlers/command.handler';

@Module({
  imports: [TelegramModule, QuestionnaireModule],
  providers: [InteractionService, CallbackQueryHandler, CommandHandler],
})
export class InteractionModule {}
