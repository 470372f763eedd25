import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { MemoryTaskStore, TaskDb, type RegistryStore } from '@taskescrow/task-db';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger, createStderrLogger } from './logger.js';
import { createTaskMcpServer } from './mcp.js';
import { AccountLedger, LedgerTransfer, TaskRegistry, systemClock } from './registry/index.js';
import { ReplayGuard } from './replay.js';

const main = async () => {
  const config = loadConfig();
  const makeLogger = config.enableMcp
    ? (module: string) => createStderrLogger(module, config.logLevel)
    : createLogger;
  const logger = makeLogger('server');

  let store: RegistryStore;
  if (config.databaseUrl) {
    const db = TaskDb.fromPoolConfig({ connectionString: config.databaseUrl });
    await db.migrate();
    store = db;
  } else {
    logger.warn('DATABASE_URL not set; registry state lives in memory');
    store = new MemoryTaskStore();
  }

  const registry = await TaskRegistry.open({
    store,
    owner: config.ownerAddress,
    platformFeePercentage: config.platformFeePercentage,
    transfers: new LedgerTransfer(config.blockedRecipients),
    clock: systemClock,
    logger: makeLogger('task-registry')
  });
  registry.onEvent((event) => {
    logger.info({ event: event.type, taskId: event.taskId }, 'Registry event');
  });

  const ctx = {
    config,
    registry,
    ledger: new AccountLedger(store, makeLogger('account-ledger')),
    replayGuard: new ReplayGuard(),
    clock: systemClock
  };

  const app = buildApp(ctx, {
    logger: config.enableMcp ? { level: config.logLevel, stream: process.stderr } : { level: config.logLevel }
  });
  app.addHook('onClose', () => store.close());
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`HTTP server listening on ${config.host}:${config.port}`);

  if (config.enableMcp) {
    const mcpServer = createTaskMcpServer(ctx);
    await mcpServer.connect(new StdioServerTransport());
    logger.info('MCP server started on stdio');
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
