import { Module } from '@nestjs/common';
import { TelegramService } from './telegram.service';
import { OperatorAlertService } from './operator-alert.service';

@Module({
  providers: [TelegramService, OperatorAlertService],
  exports: [TelegramService, OperatorAlertService],
})
export class TelegramModule {}
