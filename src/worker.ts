/**
 * Standalone worker process for rehab events
 *
 * Run with: npm run worker
 */
import 'dotenv/config';
import { startWorkers, stopWorkers, closeQueues, getWorkerStatus } from './jobs/index.js';
import { closeDatabase } from './lib/db.js';

async function main() {
  console.log('Rehabilitation Event Worker');
  console.log('===========================');

  await startWorkers();
  console.log('Worker status:', getWorkerStatus());

  const shutdown = async (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    try {
      await stopWorkers();
      await closeQueues();
      await closeDatabase();
      console.log('Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  console.log('\nWorker is running. Press Ctrl+C to stop.\n');
}

main().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
