import 'dotenv/config';
import { WebSocketServer } from 'ws';
import { createContainer } from './container';
import { createApp } from './app';
import { WebSocketBridge } from './infrastructure/websocket/WebSocketBridge';
import { toError } from './domain/common/Errors';

async function startServer() {
  // Create and initialize dependency container
  const container = await createContainer();
  await container.initialize();

  const { config, logger, eventBus } = container;
  logger.debug(config.toString());

  const app = createApp(container);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.serverUrl}`);
  });

  // Start WebSocket server with event bus bridge
  const wss = new WebSocketServer({ server });
  const wsBridge = new WebSocketBridge(wss, eventBus, logger);

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      process.exit(1);
    }
    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    const forceExitTimeout = setTimeout(() => {
      process.exit(1);
    }, 5000);

    try {
      wsBridge.detach();
      wss.clients.forEach(client => {
        client.close();
      });
      wss.close();

      await container.shutdown();

      server.close(() => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      });
    } catch (err) {
      logger.error('Shutdown failed', toError(err));
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return { app, server, container };
}

startServer().catch(err => {
  console.error('Failed to start server:', toError(err).message);
  process.exit(1);
});
