import { Module } from '@nestjs/common';
import { SharedModule } from '@app/shared';
import { DiscoveryModule } from './discovery/discovery.module';
import { ReminderModule } from './reminder/reminder.module';
import { InteractionModule } from './interaction/interaction.module';

@Module({
  imports: [SharedModule, DiscoveryModule, ReminderModule, InteractionModule],
})
export class AppModule {}
