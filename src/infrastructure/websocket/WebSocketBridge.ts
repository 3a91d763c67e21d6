import { WebSocketServer, WebSocket, RawData } from 'ws';
import { z } from 'zod';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { ALL_EVENT_NAMES, EventName } from '../../domain/events/DomainEvents';

const clientMessageSchema = z.object({
  type: z.string(),
  events: z.array(z.string()).optional(),
});

/**
 * Bridges domain events to WebSocket clients.
 *
 * Clients can send `{ type: 'subscribe', events: [...] }` with event name
 * prefixes (e.g. `trigger:`) to narrow what they receive. Clients without
 * a subscription receive every event.
 */
export class WebSocketBridge {
  private logger: ILogger;
  private subscriptions = new Map<WebSocket, string[]>();
  private unsubscribers: Array<() => void> = [];

  constructor(
    private wss: WebSocketServer,
    private eventBus: IEventBus,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'websocket' });
    this.setupEventHandlers();
    this.setupConnectionHandlers();
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('close', () => {
        this.subscriptions.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket client error:', error);
      });

      ws.on('message', (data: RawData) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(data.toString());
        } catch {
          this.logger.warn('Failed to parse WebSocket message');
          return;
        }
        const message = clientMessageSchema.safeParse(parsed);
        if (!message.success) {
          this.logger.warn('Ignoring WebSocket message without a type');
          return;
        }
        this.handleClientMessage(ws, message.data);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, message: z.infer<typeof clientMessageSchema>): void {
    if (message.type === 'ping') {
      ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
      return;
    }

    if (message.type === 'subscribe' && message.events) {
      this.subscriptions.set(ws, message.events);
      ws.send(JSON.stringify({ type: 'subscribed', events: message.events, timestamp: Date.now() }));
      return;
    }

    if (message.type === 'unsubscribe') {
      this.subscriptions.delete(ws);
      ws.send(JSON.stringify({ type: 'unsubscribed', timestamp: Date.now() }));
      return;
    }

    this.logger.debug('Received WebSocket message', { type: message.type });
  }

  private setupEventHandlers(): void {
    for (const event of ALL_EVENT_NAMES) {
      const handler = (data: unknown) => {
        this.broadcast(event, data);
      };
      this.eventBus.on(event, handler);
      this.unsubscribers.push(() => this.eventBus.off(event, handler));
    }

    this.logger.info(`WebSocket bridge subscribed to ${ALL_EVENT_NAMES.length} events`);
  }

  /**
   * Send an event to every open client whose subscription matches.
   */
  private broadcast(event: EventName, data: unknown): void {
    const message = JSON.stringify({
      type: event,
      event,
      data,
      timestamp: Date.now()
    });

    this.wss.clients.forEach((client) => {
      if (client.readyState !== WebSocket.OPEN) return;

      const prefixes = this.subscriptions.get(client);
      if (prefixes && !prefixes.some(prefix => event.startsWith(prefix))) {
        return;
      }

      client.send(message);
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }

  /**
   * Stop forwarding events. Connected clients are left to the server to close.
   */
  detach(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
