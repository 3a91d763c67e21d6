import { Task, TaskDraft, TaskFilter } from '../../types';

/**
 * Repository interface for Task persistence operations.
 */
export interface ITaskRepository {
  /**
   * Store a new task. The store assigns `id` and `createdAt`.
   */
  create(draft: TaskDraft): Promise<Task>;

  findById(id: number): Promise<Task | null>;

  findAll(filter?: TaskFilter): Promise<Task[]>;

  /**
   * Tasks that are not completed and reference one of the geofences.
   */
  findOpenByGeofenceIds(geofenceIds: readonly string[]): Promise<Task[]>;

  /**
   * First task that is not completed and carries exactly this name.
   */
  findOpenByName(name: string): Promise<Task | null>;

  /**
   * Persist every mutable field. `createdAt` is never overwritten.
   */
  update(task: Task): Promise<Task>;

  /**
   * @returns false when no task had this id
   */
  delete(id: number): Promise<boolean>;

  /**
   * Detach every task bound to a geofence that is going away.
   */
  clearGeofence(geofenceId: string): Promise<number>;

  /**
   * Insert a task keeping its id and creation time (backup import).
   */
  restore(task: Task): Promise<void>;

  deleteAll(): Promise<number>;
}
