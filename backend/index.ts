import { loadConfig, loadEnvFile } from './config';
import { connectStore } from './database';
import { createApp } from './server';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();

  const store = await connectStore(config.databaseUrl);
  const app = createApp({ store, config });

  const server = app.listen(config.port, '0.0.0.0', () => {
    console.log(`Server running on port ${config.port} and listening on 0.0.0.0`);
    console.log(`Environment: ${config.nodeEnv}`);
    console.log(`Database connection: ${store ? `connected to ${store.name}` : 'not available'}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      const closing = store ? store.close() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Shutdown error:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Startup error:', error);
  process.exit(1);
});
