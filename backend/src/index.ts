/**
 * Market backend entry point
 */

import { config, validateConfig } from './config.js';
import { createMarketServices } from './services/market-service.js';
import { startStatusMonitor } from './services/status-monitor.js';
import { createApp } from './app.js';

async function main() {
  console.log('\n UP/DOWN MARKETS BACKEND');
  console.log(`   Mode: ${config.localMode ? 'LOCAL (in-memory store and escrow)' : 'Upstash Redis'}`);

  const validation = validateConfig();
  if (!validation.valid) {
    console.error(' Invalid configuration:');
    for (const error of validation.errors) {
      console.error(`   - ${error}`);
    }
    process.exit(1);
  }

  const { market, devEscrow } = await createMarketServices();
  const app = createApp(market, { devEscrow });

  const server = app.listen(config.port, () => {
    console.log(`   Listening on port ${config.port}\n`);
  });

  const stopMonitor = await startStatusMonitor(market, config.monitor.checkInterval);

  const shutdown = () => {
    console.log('\n Shutting down...');
    stopMonitor();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(' Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
