import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  telegramConfig,
  notionConfig,
  pollingConfig,
  storageConfig,
} from './config/configuration';
import { validationSchema } from './config/validation.schema';
import { ShutdownSignal } from './lifecycle/shutdown.signal';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [telegramConfig, notionConfig, pollingConfig, storageConfig],
      validationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
  ],
  providers: [ShutdownSignal],
  exports: [ConfigModule, ShutdownSignal],
})
export class SharedModule {}
