import { Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { describeError } from '@app/shared/errors/feedback.errors';
import { OperatorAlertService } from '../telegram/operator-alert.service';

/**
 * Fixed-period background loop. A tick that fires while the previous cycle
 * is still running is skipped. Cycle failures are logged and alerted; the
 * loop carries on with its next tick.
 */
export abstract class IntervalLoop implements OnApplicationBootstrap, OnModuleDestroy {
  protected abstract readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  protected constructor(protected readonly alertService: OperatorAlertService) {}

  protected abstract get loopName(): string;
  protected abstract get intervalMs(): number;
  /** Whether the first cycle runs at bootstrap rather than after one period. */
  protected abstract get runOnStart(): boolean;

  abstract runCycle(): Promise<void>;

  onApplicationBootstrap(): void {
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
    this.logger.log(`${this.loopName} started (interval: ${this.intervalMs}ms)`);
    if (this.runOnStart) {
      void this.tick();
    }
  }

  /** Stops the timer and waits for a cycle that is still running. */
  async onModuleDestroy(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.log(`${this.loopName} stopped`);
  }

  /** Run one cycle unless one is already in flight. Never rejects. */
  async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug(`${this.loopName} still running, tick skipped`);
      return;
    }

    this.inFlight = this.runGuarded();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async runGuarded(): Promise<void> {
    try {
      await this.runCycle();
    } catch (err) {
      this.logger.error(`${this.loopName} cycle failed: ${describeError(err)}`);
      await this.alertService.notify(`${this.loopName} cycle failed`, err);
    }
  }
}
