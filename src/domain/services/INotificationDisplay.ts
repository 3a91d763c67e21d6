import { NotificationRequest } from '../../types';

/**
 * Local notification surface shared by every context.
 */
export interface INotificationDisplay {
  /**
   * Show or replace the notification with `request.id`.
   */
  show(request: NotificationRequest): Promise<void>;

  cancel(id: number): Promise<void>;
}
