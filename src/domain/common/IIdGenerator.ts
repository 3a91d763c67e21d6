/**
 * Generates notification ids shared by the alert, the handshake mailbox
 * name and the notification history rows of one trigger.
 */
export interface INotificationIdGenerator {
  /**
   * @returns A positive integer in the 31-bit range
   * @example
   * next() => 1583920147
   */
  next(): number;
}

/**
 * Generates string ids for entities the user does not name, e.g. geofences.
 */
export interface IIdGenerator {
  /**
   * @example
   * generate('geo') => 'geo_lq2x8k1c_4f9a2b'
   */
  generate(prefix: string): string;
}
