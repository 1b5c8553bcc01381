import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pollingConfig } from '@app/shared/config/configuration';
import { describeError } from '@app/shared/errors/feedback.errors';
import { IntervalLoop } from '../common/interval-loop';
import { NotionService } from '../notion/notion.service';
import { QuestionnaireRepository } from '../store/questionnaire.repository';
import { QuestionnaireService } from '../questionnaire/questionnaire.service';
import { OperatorAlertService } from '../telegram/operator-alert.service';

/** Re-issues the initial prompt of every questionnaire nobody has started. */
@Injectable()
export class ReminderService extends IntervalLoop {
  protected readonly logger = new Logger(ReminderService.name);

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
    return 'Reminder';
  }

  protected get intervalMs(): number {
    return this.pollingCfg.reminderIntervalMs;
  }

  protected get runOnStart(): boolean {
    return false;
  }

  async runCycle(): Promise<void> {
    const pending = this.repository.listPending();
    this.logger.log(`Reminder: ${pending.length} pending questionnaire(s)`);

    for (const questionnaire of pending) {
      const meetingId = questionnaire.meetingId;
      try {
        const counterpartName = await this.notionService.getCounterpartName(meetingId);
        const sent = await this.questionnaireService.reissuePrompt(questionnaire, counterpartName);
        if (!sent) {
          this.logger.debug(`Reminder for meeting ${meetingId.slice(0, 8)} superseded`);
        }
      } catch (err) {
        this.logger.error(`Reminder for meeting ${meetingId.slice(0, 8)} failed: ${describeError(err)}`);
      }
    }
  }
}
