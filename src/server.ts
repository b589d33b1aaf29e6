import { FeedStore } from './feed.js';
import { loadConfig } from './config.js';
import { loadSeedThreads } from './loader.js';
import { createApp } from './app.js';

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const config = await loadConfig();

  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : config.port;

  let store = new FeedStore();
  if (config.seedFile) {
    console.log(`Seeding feed from: ${config.seedFile}`);
    const seeded = await loadSeedThreads({ seedFile: config.seedFile, store });
    store = seeded.store;
    console.log(`Loaded ${seeded.loaded} threads`);

    if (seeded.errors.length > 0) {
      console.warn('Warnings:', seeded.errors);
    }
  }

  const app = createApp(store, { defaultListLimit: config.defaultListLimit });

  const server = app.listen(port, () => {
    console.log(`Entity link API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
