import { NewTaskHistoryEntry, TaskHistoryEntry } from '../../types';

export interface CloseHistoryEntry {
  endTime: number;
  durationSeconds: number;
  completionDate: string;
}

/**
 * Repository interface for task work sessions.
 */
export interface ITaskHistoryRepository {
  /**
   * Insert an open entry (no end time yet).
   */
  open(entry: NewTaskHistoryEntry): Promise<TaskHistoryEntry>;

  findOpenByTaskId(taskId: number): Promise<TaskHistoryEntry | null>;

  /**
   * Close an open entry. Closed entries are never changed again.
   * @throws {NotFoundError} if no open entry has this id
   */
  close(id: number, closing: CloseHistoryEntry): Promise<TaskHistoryEntry>;

  delete(id: number): Promise<boolean>;

  findAll(filter?: { taskId?: number }): Promise<TaskHistoryEntry[]>;

  /**
   * Raw insert used by backup import; keeps the given id.
   */
  restore(entry: TaskHistoryEntry): Promise<void>;

  deleteAll(): Promise<number>;
}
