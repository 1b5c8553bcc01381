/**
 * Network or HTTP failure from the record store or the messaging channel.
 * Caught at the loop boundary; the loop carries on with its next tick.
 */
export class TransientUpstreamError extends Error {
  constructor(
    readonly upstream: 'notion' | 'telegram',
    message: string,
    readonly status?: number,
  ) {
    super(`${upstream}: ${message}`);
    this.name = 'TransientUpstreamError';
  }
}

/**
 * A collaborator response is missing a field the bot depends on.
 * Caught per meeting / per event.
 */
export class DataShapeError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[],
  ) {
    super(`Unexpected ${source} shape: ${issues.join('; ')}`);
    this.name = 'DataShapeError';
  }
}

/**
 * The action does not target the current question of a live questionnaire.
 * Ignored without any state change or user-visible effect.
 */
export class StaleActionError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'StaleActionError';
  }
}

/**
 * The closing feedback record could not be written back.
 * Local status stays completed; not retried.
 */
export class WriteBackFailure extends Error {
  constructor(
    readonly meetingId: string,
    readonly reason: unknown,
  ) {
    super(
      `Feedback write-back failed for meeting ${meetingId}: ${describeError(reason)}`,
    );
    this.name = 'WriteBackFailure';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
