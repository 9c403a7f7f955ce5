import { loadConfig } from './config/env';
import { createContext } from './container';
import { createApp } from './app';

async function start() {
  const config = loadConfig();
  const ctx = await createContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.port, () => {
    console.log(`\n[Server] Leave service running on http://localhost:${config.port} (${config.storeDriver} store)`);
    console.log(`   Health: http://localhost:${config.port}/health`);
    console.log(`   Leaves: http://localhost:${config.port}/api/leaves`);
    console.log(`   Employees: http://localhost:${config.port}/api/employees`);
    console.log(`   Report: http://localhost:${config.port}/api/reports/leave\n`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      ctx.close()
        .then(() => console.log('[Server] Closed'))
        .catch((err: unknown) => {
          console.error('[Server] Error during shutdown:', err);
          process.exitCode = 1;
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  console.error('[Server] Failed to start:', err);
  process.exitCode = 1;
});
