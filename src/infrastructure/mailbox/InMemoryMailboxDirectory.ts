import { ConflictError, ValidationError } from '../../domain/common/Errors';
import { ILogger } from '../../domain/common/ILogger';
import { IMailboxDirectory, MailboxReceiver, MailboxSender } from '../../domain/services/IMailboxDirectory';

type Waiter = (message: unknown) => void;

/**
 * One named mailbox: a FIFO of cloned messages plus the receivers waiting on it.
 */
class Mailbox implements MailboxReceiver {
  private readonly queue: unknown[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(readonly name: string, private readonly onClose: (mailbox: Mailbox) => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  deliver(message: unknown): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.queue.push(message);
    }
  }

  receive(timeoutMs: number): Promise<unknown> {
    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.shift());
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<unknown>((resolve) => {
      let resolved = false;

      const waiter: Waiter = (message) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(timer);
        resolve(message);
      };

      const timer = setTimeout(() => {
        if (resolved) return;
        resolved = true;
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(null);
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  /**
   * Wakes every pending receive with null. Queued messages are dropped.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<unknown> {
    while (!this.closed) {
      const message = await this.receive(60_000);
      if (message !== null) {
        yield message;
      }
    }
  }
}

/**
 * Process-wide mailbox directory. Every context of the process shares the
 * same instance; senders never hand object references to receivers.
 */
export class InMemoryMailboxDirectory implements IMailboxDirectory {
  private readonly mailboxes = new Map<string, Mailbox>();
  private readonly logger: ILogger;

  constructor(logger: ILogger) {
    this.logger = logger.child({ component: 'mailbox' });
  }

  register(name: string): MailboxReceiver {
    if (this.mailboxes.has(name)) {
      throw new ConflictError(`Mailbox '${name}' is already registered`);
    }
    const mailbox = new Mailbox(name, (closed) => {
      if (this.mailboxes.get(closed.name) === closed) {
        this.mailboxes.delete(closed.name);
      }
    });
    this.mailboxes.set(name, mailbox);
    this.logger.debug(`Mailbox registered: ${name}`);
    return mailbox;
  }

  lookup(name: string): MailboxSender | null {
    const mailbox = this.mailboxes.get(name);
    if (!mailbox) return null;

    return {
      name,
      send: (message: unknown) => {
        if (message === null || message === undefined) {
          throw new ValidationError('Mailbox messages cannot be empty');
        }
        if (mailbox.isClosed) {
          this.logger.debug(`Dropping message for closed mailbox: ${name}`);
          return;
        }
        mailbox.deliver(structuredClone(message));
      },
    };
  }

  unregister(name: string): boolean {
    const mailbox = this.mailboxes.get(name);
    if (!mailbox) return false;
    mailbox.close();
    this.logger.debug(`Mailbox unregistered: ${name}`);
    return true;
  }

  registeredNames(): string[] {
    return [...this.mailboxes.keys()].sort();
  }
}
