/**
 * INotificationSink - Port Interface for Outbound Notifications
 *
 * The engine never delivers messages itself. It hands level-up, prestige and
 * daily report requests to the transport through this port, without waiting
 * on delivery.
 *
 * @module packages/core/ports/INotificationSink
 */

import type { DailyReport, ProgressNotification } from '../../../types/index.js';

export interface INotificationSink {
  /**
   * Announce a level-up or prestige
   */
  notify(notification: ProgressNotification): Promise<void> | void;

  /**
   * Publish the report for a finished calendar day
   */
  reportDailyStats(report: DailyReport): Promise<void> | void;
}
