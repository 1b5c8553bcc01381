import { Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { QuestionnaireRepository } from './questionnaire.repository';

@Module({
  providers: [DatabaseService, QuestionnaireRepository],
  exports: [QuestionnaireRepository],
})
export class StoreModule {}
