/**
 * Daily Report Job
 *
 * Checks every reportCheckIntervalMs whether the calendar day has changed.
 * The check compares dates rather than waiting for an exact midnight tick,
 * so a busy or sleeping process still reports every finished day once.
 *
 * A rollover can also be triggered by an incoming message; the job tracks the
 * last date it saw and reports that day from history either way.
 *
 * @module jobs/daily-report
 */

import type { ProgressionEngine } from '../services/engine.js';
import type { INotificationSink } from '../packages/core/ports/INotificationSink.js';
import type { DailyReport, DateKey } from '../types/index.js';
import { toDateKey } from '../utils/dates.js';
import { logger as defaultLogger } from '../utils/logger.js';

export interface DailyReportJobConfig {
  engine: ProgressionEngine;
  sink: INotificationSink;
  /** Date the stored counters belonged to before startup, if any */
  lastSeenDate?: DateKey | null;
  /** Check interval in milliseconds. Default: 60000 */
  intervalMs?: number;
  /** Clock, for tests */
  now?: () => Date;
  logger?: typeof defaultLogger;
}

export class DailyReportJob {
  private engine: ProgressionEngine;
  private sink: INotificationSink;
  private intervalMs: number;
  private now: () => Date;
  private logger: typeof defaultLogger;
  private lastSeenDate: DateKey | null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(config: DailyReportJobConfig) {
    this.engine = config.engine;
    this.sink = config.sink;
    this.intervalMs = config.intervalMs ?? 60_000;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? defaultLogger;
    this.lastSeenDate = config.lastSeenDate || null;
  }

  /**
   * Run one check
   * @returns the report that was sent, or null when the day has not changed
   */
  async execute(): Promise<DailyReport | null> {
    const now = this.now();
    const today = toDateKey(now);
    this.engine.ensureCurrentDay(now);

    const finished = this.lastSeenDate;
    this.lastSeenDate = today;
    if (finished === null || finished === today) {
      return null;
    }

    const report = this.engine.buildDailyReport(finished);
    if (!report) {
      this.logger.warn({ event: 'daily_report.missing', date: finished }, 'No stats recorded for finished day');
      return null;
    }

    try {
      await this.sink.reportDailyStats(report);
      this.logger.info({
        event: 'daily_report.sent',
        date: report.date,
        messages: report.summary.messages,
        activeUsers: report.summary.activeUsers,
      }, `Daily report sent for ${report.date}`);
    } catch (err) {
      this.logger.error({ event: 'daily_report.error', date: report.date, error: err }, 'Failed to send daily report');
    }
    return report;
  }

  start(): void {
    if (this.timer) return;
    this.logger.info({ event: 'daily_report.started', intervalMs: this.intervalMs },
      `Daily report job started (interval: ${this.intervalMs}ms)`);
    this.timer = setInterval(() => {
      this.execute().catch((error) => {
        this.logger.error({ event: 'daily_report.error', error }, 'Daily report check failed');
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info({ event: 'daily_report.stopped' }, 'Daily report job stopped');
    }
  }
}
