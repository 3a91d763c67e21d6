/**
 * Sending side of a named mailbox. Messages are copied on send; the
 * receiver never shares an object with the sender.
 */
export interface MailboxSender {
  readonly name: string;
  send(message: unknown): void;
}

/**
 * Receiving side of a named mailbox, consumable as an async stream.
 */
export interface MailboxReceiver extends AsyncIterable<unknown> {
  readonly name: string;

  /**
   * Next message, or null once `timeoutMs` passes or the mailbox closes.
   */
  receive(timeoutMs: number): Promise<unknown>;

  close(): void;
}

/**
 * Process-wide directory of mailboxes looked up by well-known names.
 */
export interface IMailboxDirectory {
  /**
   * @throws {ConflictError} if the name is already registered
   */
  register(name: string): MailboxReceiver;

  lookup(name: string): MailboxSender | null;

  /**
   * Remove the name and close its receiver.
   * @returns false when nothing was registered under the name
   */
  unregister(name: string): boolean;
}
