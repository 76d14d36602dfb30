import { serve } from '@hono/node-server';
import { createGateway } from './index';
import { ConfigError, loadConfig, type GatewayConfig } from './config';
import { createLogger, serializeError } from './logger';
import { createInMemoryStores } from './storage/memory';
import { createSqliteStores, openDatabase } from './storage/sqlite';
import { createOpenAIClient, createOpenAICompletionService } from './proxy/upstream';

function readConfig(): GatewayConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger('error').error({ issues: err.issues }, 'Refusing to start');
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const config = readConfig();
  const logger = createLogger(config.logLevel, { service: 'quota-gateway' });

  const inMemory = config.databasePath === ':memory:';
  const db = inMemory ? undefined : openDatabase(config.databasePath);
  const stores = db ? createSqliteStores(db) : createInMemoryStores();

  const completionService = createOpenAICompletionService({
    client: createOpenAIClient(config.openaiApiKey, config.upstreamMaxRetries),
    model: config.model,
    timeoutMs: config.upstreamTimeoutMs,
    logger,
  });

  const gateway = createGateway({ config, stores, completionService, logger });

  const server = serve({ fetch: gateway.fetch, port: config.port }, (info) => {
    logger.info(
      { port: info.port, model: config.model, storage: inMemory ? 'memory' : config.databasePath },
      'Gateway listening'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) logger.error({ error: serializeError(err) }, 'Error while closing server');
      db?.close();
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
