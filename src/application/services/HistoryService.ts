import { ValidationError } from '../../domain/common/Errors';
import { isDateKey } from '../../domain/common/dates';
import { StorageSession } from '../../domain/repositories/IStorageGateway';
import { DailyStatistics, NotificationHistoryEntry, TaskHistoryEntry, TaskStatistics } from '../../types';

export interface StatisticsRange {
  from?: string;
  to?: string;
}

type TaskTotals = TaskStatistics['byTask'][number];

/**
 * Read side of task sessions and notification history.
 */
export class HistoryService {
  constructor(private storage: Pick<StorageSession, 'taskHistory' | 'notificationHistory'>) {}

  async getTaskHistory(taskId?: number): Promise<TaskHistoryEntry[]> {
    return this.storage.taskHistory.findAll(taskId !== undefined ? { taskId } : {});
  }

  /**
   * Totals over closed sessions whose completion date lies in the range.
   * Open sessions are only counted.
   */
  async getStatistics(range: StatisticsRange = {}): Promise<TaskStatistics> {
    for (const bound of [range.from, range.to]) {
      if (bound !== undefined && !isDateKey(bound)) {
        throw new ValidationError('from and to must be yyyy-MM-dd dates', range);
      }
    }

    const entries = await this.storage.taskHistory.findAll();
    const openSessions = entries.filter(entry => entry.endTime === null).length;
    const closed = entries.filter(entry =>
      entry.completionDate !== null &&
      (range.from === undefined || entry.completionDate >= range.from) &&
      (range.to === undefined || entry.completionDate <= range.to)
    );

    const byDate = new Map<string, DailyStatistics>();
    const byTask = new Map<string, TaskTotals>();
    let totalSeconds = 0;

    for (const entry of closed) {
      const seconds = entry.durationSeconds ?? 0;
      totalSeconds += seconds;

      const date = entry.completionDate ?? '';
      const day = byDate.get(date) ?? { date, sessions: 0, totalSeconds: 0 };
      day.sessions++;
      day.totalSeconds += seconds;
      byDate.set(date, day);

      const taskKey = entry.taskId !== null ? `id:${entry.taskId}` : `name:${entry.taskName}`;
      const totals = byTask.get(taskKey) ?? { taskId: entry.taskId, taskName: entry.taskName, sessions: 0, totalSeconds: 0 };
      totals.sessions++;
      totals.totalSeconds += seconds;
      byTask.set(taskKey, totals);
    }

    return {
      totalSessions: closed.length,
      openSessions,
      totalSeconds,
      byDate: [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date)),
      byTask: [...byTask.values()].sort((a, b) => b.totalSeconds - a.totalSeconds || a.taskName.localeCompare(b.taskName)),
    };
  }

  async listNotificationHistory(limit?: number): Promise<NotificationHistoryEntry[]> {
    return this.storage.notificationHistory.findAll(limit);
  }

  async clearNotificationHistory(): Promise<number> {
    return this.storage.notificationHistory.clearAll();
  }
}
