import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pollingConfig } from '@app/shared/config/configuration';
import { MeetingPage } from '@app/shared/types/meeting.types';
import { describeError } from '@app/shared/errors/feedback.errors';
import { IntervalLoop } from '../common/interval-loop';
import { NotionService } from '../notion/notion.service';
import { QuestionnaireRepository } from '../store/questionnaire.repository';
import { QuestionnaireService } from '../questionnaire/questionnaire.service';
import { OperatorAlertService } from '../telegram/operator-alert.service';

export interface DiscoveryStats {
  found: number;
  enqueued: number;
  skipped: number;
  failed: number;
}

/** Finds completed meetings without feedback and opens their questionnaires. */
@Injectable()
export class DiscoveryService extends IntervalLoop {
  protected readonly logger = new Logger(DiscoveryService.name);

  constructor(
    private readonly notionService: NotionService,
    private readonly repository: QuestionnaireRepository,
    private readonly questionnaireService: QuestionnaireService,
    alertService: OperatorAlertService,
    @Inject(pollingConfig.KEY)
    private readonly pollingCfg: ConfigType<typeof pollingConfig>,
  ) {
    super(alertService);
  }

  protected get loopName(): string {
    return 'Discovery';
  }

  protected get intervalMs(): number {
    return this.pollingCfg.discoveryIntervalMs;
  }

  protected get runOnStart(): boolean {
    return true;
  }

  async runCycle(): Promise<void> {
    await this.discover();
  }

  async discover(now: Date = new Date()): Promise<DiscoveryStats> {
    const pages = await this.notionService.queryCompletedMeetings(now);
    const stats: DiscoveryStats = { found: pages.length, enqueued: 0, skipped: 0, failed: 0 };

    for (const page of pages) {
      if (this.repository.isProcessed(page.id)) {
        stats.skipped++;
        continue;
      }

      try {
        await this.processPage(page);
        stats.enqueued++;
      } catch (err) {
        stats.failed++;
        this.logger.error(`Meeting ${page.id.slice(0, 8)} not enqueued: ${describeError(err)}`);
        await this.alertService.notify(`Discovery of meeting ${page.id}`, err);
      }
    }

    this.logger.log(
      `Discovery: found=${stats.found} enqueued=${stats.enqueued} skipped=${stats.skipped} failed=${stats.failed}`,
    );
    return stats;
  }

  private async processPage(page: MeetingPage): Promise<void> {
    const meeting = await this.notionService.toMeeting(page);
    const result = await this.questionnaireService.enqueue(meeting);
    this.logger.debug(`Meeting ${meeting.id.slice(0, 8)} enqueue result: ${result}`);
  }
}
