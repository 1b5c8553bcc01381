import { Injectable, Inject, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pollingConfig } from '@app/shared/config/configuration';
import { ShutdownSignal } from '@app/shared/lifecycle/shutdown.signal';
import { RawUpdate } from '@app/shared/types/telegram.types';
import { StaleActionError, describeError } from '@app/shared/errors/feedback.errors';
import { TelegramService } from '../telegram/telegram.service';
import { parseInboundEvent } from '../telegram/telegram.schemas';
import { CallbackQueryHandler } from './handlers/callback-query.handler';
import { CommandHandler } from './handlers/command.handler';

/**
 * Continuous long-poll over the Bot API. The offset lives in memory, so
 * updates received just before a restart are delivered again.
 */
@Injectable()
export class InteractionService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(InteractionService.name);
  private offset = 0;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly telegramService: TelegramService,
    private readonly callbackQueryHandler: CallbackQueryHandler,
    private readonly commandHandler: CommandHandler,
    private readonly shutdown: ShutdownSignal,
    @Inject(pollingConfig.KEY)
    private readonly pollingCfg: ConfigType<typeof pollingConfig>,
  ) {}

  get currentOffset(): number {
    return this.offset;
  }

  onApplicationBootstrap(): void {
    this.loop = this.run();
  }

  async onModuleDestroy(): Promise<void> {
    this.shutdown.abort();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  /**
   * One long-poll round trip. Returns the number of updates handled; a
   * failed request waits out the error backoff and returns 0.
   */
  async pollOnce(): Promise<number> {
    let updates: RawUpdate[];
    try {
      updates = await this.telegramService.getUpdates(this.offset, this.shutdown.signal);
    } catch (err) {
      this.logger.error(`getUpdates failed: ${describeError(err)}`);
      await this.shutdown.sleep(this.pollingCfg.errorBackoffMs);
      return 0;
    }

    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      await this.handleUpdate(update);
    }
    return updates.length;
  }

  async handleUpdate(update: RawUpdate): Promise<void> {
    try {
      const event = parseInboundEvent(update);
      if (!event) {
        this.logger.debug(`Update ${update.update_id} ignored`);
        return;
      }

      if (event.kind === 'callback_query') {
        await this.callbackQueryHandler.handle(event);
      } else {
        await this.commandHandler.handle(event);
      }
    } catch (err) {
      if (err instanceof StaleActionError) {
        this.logger.debug(`Stale action in update ${update.update_id}: ${err.message}`);
        return;
      }
      this.logger.error(`Update ${update.update_id} failed: ${describeError(err)}`);
    }
  }

  private async run(): Promise<void> {
    this.logger.log('Long polling started');
    while (!this.shutdown.aborted) {
      await this.pollOnce();
    }
    this.logger.log('Long polling stopped');
  }
}
