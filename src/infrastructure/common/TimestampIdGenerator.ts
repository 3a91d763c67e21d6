import { randomBytes } from 'crypto';
import { IIdGenerator } from '../../domain/common/IIdGenerator';

/**
 * `{prefix}_{base36 timestamp}_{6 hex chars}`. Sorts roughly by creation time.
 */
export class TimestampIdGenerator implements IIdGenerator {
  generate(prefix: string): string {
    return `${prefix}_${Date.now().toString(36)}_${randomBytes(3).toString('hex')}`;
  }
}
