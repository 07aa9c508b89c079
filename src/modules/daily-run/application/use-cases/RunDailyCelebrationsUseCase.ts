import type { IEmailSender, DeliveryOutcome } from '../ports/IEmailSender';
import type { DailyRunSettings } from '../types/DailyRunSettings';
import type { IRecordStore } from '../../../employee/application/ports/IRecordStore';
import type { EventMatcher } from '../../../celebration/domain/services/EventMatcher';
import { describeMatch, type EventCategory, type EventMatch } from '../../../celebration/domain/entities/EventMatch';
import { composeGreeting } from '../../../celebration/domain/services/GreetingFormatter';
import type { ITextCompositor } from '../../../card-rendering/application/ports/ITextCompositor';
import { buildCardFileName } from '../../../card-rendering/domain/services/CardFileName';
import type { IReportWriter } from '../../../reporting/application/ports/IReportWriter';
import type { RunStats } from '../../../reporting/domain/entities/RunStats';
import { RunStatsAggregator, type Clock } from '../../../reporting/domain/services/RunStatsAggregator';
import { TransportError } from '../../../../domain/errors/TransportError';
import { describeError, type ILogger } from '../../../../shared/logger';
import { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

export interface GeneratedCard {
  category: EventCategory;
  recipient: string;
  /** Where the card image was written */
  savedPath: string | null;
  /** null when no email sender is configured */
  delivered: boolean | null;
}

export interface DailyRunResult {
  /** True when no matched event failed */
  success: boolean;
  date: CalendarDate;
  reportText: string;
  /** null when the report could not be written */
  reportPath: string | null;
  cards: GeneratedCard[];
  stats: RunStats;
}

export interface RunDailyCelebrationsOptions {
  /** Cards are only rendered and saved when omitted */
  emailSender?: IEmailSender;
  /** Time source for run statistics */
  clock?: Clock;
}

/**
 * RunDailyCelebrationsUseCase
 *
 * **Purpose:**
 * One run of the match → render → (send) → report pipeline for a single day.
 *
 * **Workflow:**
 * 1. Start run statistics
 * 2. Load employee records; every unparseable date becomes an error entry
 * 3. Match birthdays and anniversaries (birthdays first, each in file order)
 * 4. For each match, one at a time: render and save the card, then send it
 *    when an email sender is configured
 * 5. Finalize the statistics and write `daily_report_YYYYMMDD.txt`
 *
 * **Error Handling Strategy:**
 *
 * | Error | Scope | Action |
 * |-------|-------|--------|
 * | NotFoundError (template) | one event | count failed, continue |
 * | Render/encode failure | one event | count failed, continue |
 * | Refused delivery | one event | count failed, continue |
 * | TransportError (sender threw) | one event | count failed, continue |
 * | NotFoundError / SchemaError (employee file) | whole run | best-effort report, rethrow |
 *
 * Every recoverable error ends up in the report with its timestamp.
 */
export class RunDailyCelebrationsUseCase {
  private readonly emailSender: IEmailSender | null;
  private readonly clock: Clock | undefined;

  public constructor(
    private readonly recordStore: IRecordStore,
    private readonly eventMatcher: EventMatcher,
    private readonly compositor: ITextCompositor,
    private readonly reportWriter: IReportWriter,
    private readonly settings: DailyRunSettings,
    private readonly logger: ILogger,
    options: RunDailyCelebrationsOptions = {}
  ) {
    this.emailSender = options.emailSender ?? null;
    this.clock = options.clock;
  }

  /**
   * @param today - Day to process; defaults to today in the configured zone
   * @throws NotFoundError | SchemaError when the employee file cannot be loaded,
   * after the partial report was written
   */
  public async execute(today?: CalendarDate): Promise<DailyRunResult> {
    const date = today ?? CalendarDate.today(this.settings.timezone);
    const stats = new RunStatsAggregator(date, this.clock);
    const cards: GeneratedCard[] = [];

    this.logger.info({ msg: 'Daily run started', date: date.toString() });

    try {
      const { records, parseErrors } = await this.recordStore.loadWithIssues(
        this.settings.employeeFile
      );
      for (const parseError of parseErrors) {
        stats.recordError(parseError.message);
      }

      const { birthdays, anniversaries } = this.eventMatcher.match(records, date);
      const matches: EventMatch[] = [...birthdays, ...anniversaries];
      for (const match of matches) {
        stats.recordMatch(match);
      }

      for (const match of matches) {
        const card = await this.processEvent(match, date, stats);
        if (card) {
          cards.push(card);
        }
      }
    } catch (error) {
      this.logger.error({
        msg: 'Daily run aborted',
        date: date.toString(),
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      stats.recordError('Daily run aborted', error);
      await this.finishReport(stats, date);
      throw error;
    }

    const { reportText, reportPath } = await this.finishReport(stats, date);
    const snapshot = stats.snapshot;
    const failed = snapshot.counters.birthday.failed + snapshot.counters.anniversary.failed;

    this.logger.info({
      msg: 'Daily run completed',
      date: date.toString(),
      cardCount: cards.length,
      failedCount: failed,
      errorCount: snapshot.errors.length,
      reportPath,
    });

    return {
      success: failed === 0,
      date,
      reportText,
      reportPath,
      cards,
      stats: snapshot,
    };
  }

  /**
   * Renders, saves and optionally sends one card. Never throws: every failure
   * is counted against the event's category.
   */
  private async processEvent(
    match: EventMatch,
    date: CalendarDate,
    stats: RunStatsAggregator
  ): Promise<GeneratedCard | null> {
    const category = match.kind;
    const { record } = match;
    const settings = this.settings.cards[category];
    const greeting = composeGreeting(match);

    try {
      const rendered = await this.compositor.render(
        settings.templatePath,
        greeting.cardText,
        {
          position: settings.position,
          fontSize: settings.fontSize,
          fontColor: settings.fontColor,
          customFontPath: settings.customFontPath,
          centerAlign: settings.centerAlign,
          multiline: greeting.multiline,
        },
        {
          outputDir: this.settings.outputDir,
          fileName: buildCardFileName(category, record.firstName, record.lastName, date),
        }
      );
      stats.recordCardGenerated(category);

      if (!this.emailSender) {
        stats.recordSuccess(category);
        this.logger.info({ msg: 'Card generated', category, match: describeMatch(match) });
        return { category, recipient: record.email, savedPath: rendered.savedPath, delivered: null };
      }

      const outcome = await this.deliver(this.emailSender, record.email, greeting.subject, rendered.imageBytes);
      if (outcome.delivered) {
        stats.recordSuccess(category);
        this.logger.info({ msg: 'Card sent', category, email: record.email });
      } else {
        stats.recordFailure(category, `Failed to send ${category} card to ${record.email}: ${outcome.reason}`);
        this.logger.warn({
          msg: 'Card delivery refused',
          category,
          email: record.email,
          reason: outcome.reason,
        });
      }
      return {
        category,
        recipient: record.email,
        savedPath: rendered.savedPath,
        delivered: outcome.delivered,
      };
    } catch (error) {
      stats.recordFailure(category, `Failed to process ${category} for ${record.email}`, error);
      this.logger.error({
        msg: 'Failed to process event',
        category,
        email: record.email,
        error: describeError(error),
      });
      return null;
    }
  }

  private async deliver(
    sender: IEmailSender,
    recipient: string,
    subject: string,
    imageBytes: Buffer
  ): Promise<DeliveryOutcome> {
    try {
      return await sender.send(recipient, subject, imageBytes);
    } catch (error) {
      throw new TransportError(describeError(error), recipient);
    }
  }

  /**
   * Finalizes the statistics and writes the report. A failed write is logged
   * and reported as a null path.
   */
  private async finishReport(
    stats: RunStatsAggregator,
    date: CalendarDate
  ): Promise<{ reportText: string; reportPath: string | null }> {
    const reportText = stats.finalize();
    try {
      const reportPath = await this.reportWriter.write(this.settings.outputDir, date, reportText);
      return { reportText, reportPath };
    } catch (error) {
      this.logger.error({
        msg: 'Failed to write daily report',
        outputDir: this.settings.outputDir,
        error: describeError(error),
      });
      return { reportText, reportPath: null };
    }
  }
}
