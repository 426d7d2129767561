/**
 * SERVER STARTUP SCRIPT
 *
 * Wires the effects from the environment, applies the database schema and
 * starts the HTTP API.
 *
 * Run this with: npm start
 */
import type {Server} from 'http';
import {loadConfigFromEnv} from '../effects/config';
import {EffectsFactory} from '../effects/EffectsFactory';
import {seedDemoCatalog} from '../pure/catalog';
import {createApp} from './app';

async function main(): Promise<void> {
  console.log('🚀 Starting order API...\n');

  const config = loadConfigFromEnv();
  const effects = await EffectsFactory.make(config);

  if (config.shop.seedDemoCatalog) {
    const seeded = await seedDemoCatalog()(effects);
    if (seeded.length > 0) {
      console.log(`🌱 Seeded ${seeded.length} demo products`);
    }
  }

  console.log('📋 Configuration:');
  console.log('   - Store:', config.store);
  console.log('   - Dispatch:', config.dispatch);
  console.log('   - Monitoring:', config.monitoring);
  console.log('   - Order code prefix:', config.shop.orderCodePrefix);
  console.log('   - Free zone:', config.shop.freeZone);
  console.log('   - Demo catalog:', config.shop.seedDemoCatalog ? 'on' : 'off');
  console.log('');

  const app = createApp(effects);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.apiPort, () => {
      console.log(`🌐 API server started on port ${config.apiPort}`);
      console.log(`   - Health check: GET http://localhost:${config.apiPort}/health`);
      console.log('');
      resolve(listening);
    });
  });

  const shutdown = (signal: string) => {
    console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      effects.close()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('❌ Failed to close effects:', error);
          process.exit(1);
        });
    });
  };

  // Handle graceful shutdown
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('💥 Failed to start:', error);
  process.exit(1);
});
