import { randomInt } from 'crypto';
import { INotificationIdGenerator } from '../../domain/common/IIdGenerator';

const MAX_NOTIFICATION_ID = 2147483647;

/**
 * Uniformly random notification ids in [1, 2^31 - 1).
 */
export class RandomNotificationIdGenerator implements INotificationIdGenerator {
  next(): number {
    return randomInt(1, MAX_NOTIFICATION_ID);
  }
}
