import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { RandomNotificationIdGenerator } from './infrastructure/common/RandomNotificationIdGenerator';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { SqliteStorageGateway } from './infrastructure/database/SqliteStorageGateway';
import { FileSystemKeyValueStore } from './infrastructure/state/FileSystemKeyValueStore';
import { InMemoryMailboxDirectory } from './infrastructure/mailbox/InMemoryMailboxDirectory';
import { EventBusNotificationDisplay } from './infrastructure/notifications/EventBusNotificationDisplay';
import { CommandSpeechService } from './infrastructure/speech/CommandSpeechService';
import { DistanceGeofencePlatform } from './infrastructure/geofencing/DistanceGeofencePlatform';
import { GeofenceEventChannel } from './application/channel/GeofenceEventChannel';
import { ActiveTaskMarkerStore } from './application/state/ActiveTaskMarkerStore';
import { PendingTaskQueue } from './application/state/PendingTaskQueue';
import { TaskService } from './application/services/TaskService';
import { GeofenceService } from './application/services/GeofenceService';
import { HistoryService } from './application/services/HistoryService';
import { BackupService } from './application/services/BackupService';
import { ActiveTaskArbiter } from './application/services/ActiveTaskArbiter';
import { handleGeofenceEvent, TriggerCapabilities } from './application/services/GeofenceTriggerHandler';
import { Clock, systemClock } from './domain/common/Clock';
import { ILogger } from './domain/common/ILogger';
import { INotificationIdGenerator } from './domain/common/IIdGenerator';
import { toError } from './domain/common/Errors';
import { IEventBus } from './domain/events/IEventBus';
import { StorageSession } from './domain/repositories/IStorageGateway';
import { INotificationDisplay } from './domain/services/INotificationDisplay';
import { ISpeechService } from './domain/services/ISpeechService';
import { GeofenceEvent, TriggerReport } from './types';

/**
 * Replaceable collaborators, mostly for tests.
 */
export interface ContainerOptions {
  config?: Config;
  logger?: ILogger;
  speech?: ISpeechService;
  display?: INotificationDisplay;
  notificationIds?: INotificationIdGenerator;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  eventBus: IEventBus;
  storageGateway: SqliteStorageGateway;
  storage: StorageSession;
  stateStore: FileSystemKeyValueStore;
  mailboxes: InMemoryMailboxDirectory;
  display: INotificationDisplay;
  speech: ISpeechService;
  platform: DistanceGeofencePlatform;

  // Services
  taskService: TaskService;
  geofenceService: GeofenceService;
  historyService: HistoryService;
  backupService: BackupService;
  arbiter: ActiveTaskArbiter;

  /**
   * Run a fresh background trigger handler for one platform event.
   */
  handleGeofenceEvent(event: GeofenceEvent): Promise<TriggerReport | null>;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Create and wire up all dependencies. Opens the foreground storage
 * connection, creating or migrating the database on the way.
 */
export async function createContainer(options: ContainerOptions = {}): Promise<Container> {
  // 1. Configuration
  const config = options.config ?? new Config();
  const clock = options.clock ?? systemClock;

  // 2. Infrastructure - Core
  const logger = options.logger ?? new ConsoleLogger(config.log.level, config.log.format);
  const eventBus = new InMemoryEventBus(logger);
  const idGenerator = new TimestampIdGenerator();
  const notificationIds = options.notificationIds ?? new RandomNotificationIdGenerator();

  // 3. Storage and shared state
  const storageGateway = new SqliteStorageGateway(config.storage, logger);
  await storageGateway.initialize();
  const storage = await storageGateway.open({ readOnly: false });
  const stateStore = new FileSystemKeyValueStore(config.stateDir, logger, clock);
  const mailboxes = new InMemoryMailboxDirectory(logger);

  // 4. Capabilities
  const display = options.display ?? new EventBusNotificationDisplay(eventBus, logger);
  const speech = options.speech ?? new CommandSpeechService(config.speech.command, logger);
  const platform = new DistanceGeofencePlatform(logger);

  // 5. Services
  const taskService = new TaskService(storage.tasks, eventBus, clock);
  const geofenceService = new GeofenceService(storage, platform, eventBus, idGenerator, config.geofence, logger, clock);
  const historyService = new HistoryService(storage);
  const backupService = new BackupService(storage, logger, clock);
  const arbiter = new ActiveTaskArbiter(
    storage,
    taskService,
    new ActiveTaskMarkerStore(stateStore, logger),
    new PendingTaskQueue(stateStore, config.trigger.snoozeMinutes * 60_000, logger, clock),
    new GeofenceEventChannel(mailboxes, logger, clock),
    display,
    eventBus,
    logger,
    clock
  );

  // Background invocations share nothing with the foreground but these
  const triggerCapabilities: TriggerCapabilities = {
    storage: storageGateway,
    state: stateStore,
    mailboxes,
    display,
    speech,
    ids: notificationIds,
    logger,
    settings: {
      ackTimeoutMs: config.trigger.ackTimeoutMs,
      snoozeMinutes: config.trigger.snoozeMinutes,
      alertSettleMs: config.trigger.alertSettleMs,
      speechEnabledByDefault: config.speech.enabledByDefault,
      speechPollIntervalMs: config.speech.pollIntervalMs,
      speechMaxWaitMs: config.speech.maxWaitMs,
    },
    clock,
    sleep: options.sleep,
  };

  let stopPlatformEvents: (() => void) | null = null;

  const container: Container = {
    config,
    logger,
    eventBus,
    storageGateway,
    storage,
    stateStore,
    mailboxes,
    display,
    speech,
    platform,
    taskService,
    geofenceService,
    historyService,
    backupService,
    arbiter,

    handleGeofenceEvent(event: GeofenceEvent) {
      return handleGeofenceEvent(event, triggerCapabilities);
    },

    async initialize() {
      logger.info('Initializing container...');

      await stateStore.initialize();
      const regions = await geofenceService.syncPlatform();

      stopPlatformEvents = platform.onEvent(async (event) => {
        try {
          await container.handleGeofenceEvent(event);
        } catch (err) {
          logger.error('Background trigger failed', toError(err), { geofenceIds: event.geofenceIds });
        }
      });
      arbiter.start();

      logger.info('Container initialized', { regions });
    },

    async shutdown() {
      logger.info('Shutting down container...');
      stopPlatformEvents?.();
      stopPlatformEvents = null;
      arbiter.stop();
      eventBus.removeAllListeners();
      await storage.close();
      logger.info('Container shutdown complete');
    }
  };

  return container;
}
