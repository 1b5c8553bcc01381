import { Injectable, OnModuleDestroy } from '@nestjs/common';

/**
 * Process-wide shutdown flag shared by every background loop.
 * Loops check `aborted` between iterations; long-running requests
 * receive `signal` so they are cut short on shutdown.
 */
@Injectable()
export class ShutdownSignal implements OnModuleDestroy {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  abort(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  /**
   * Resolves after `ms`, or as soon as shutdown is requested.
   */
  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      if (this.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      this.signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  onModuleDestroy(): void {
    this.abort();
  }
}
