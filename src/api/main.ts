/**
 * API STARTUP SCRIPT
 *
 * Connects the production effects and serves the commerce API.
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv} from '../effects/config';
import {makeAppEffects, ProductionEffects} from '../effects/EffectsFactory';
import {createApp} from './server';
import type {Server} from 'node:http';

async function main() {
  console.log('🚀 Starting coffee commerce API...\n');

  const config = loadConfigFromEnv();

  console.log('📋 Configuration:');
  console.log('   - PostgreSQL:', `${config.database.host}:${config.database.port}/${config.database.database}`);
  console.log('   - Email:', config.email.enabled ? `${config.email.host}:${config.email.port}` : 'disabled');
  console.log('   - Monitoring:', config.aws.monitoringEndpoint);
  console.log('');

  const appEffects = await makeAppEffects(config);
  const server = await startApiServer(appEffects, config.api.port);

  const shutdown = (signal: string) => {
    console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      appEffects.close()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('❌ Failed to release resources:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

function startApiServer(appEffects: ProductionEffects, port: number): Promise<Server> {
  const app = createApp(appEffects);

  return new Promise((resolve) => {
    const server = app.listen(port, () => {
      console.log(`🌐 API server started on port ${port}`);
      console.log(`   - Cart: http://localhost:${port}/api/cart`);
      console.log(`   - Orders: http://localhost:${port}/api/orders`);
      console.log(`   - Health check: GET http://localhost:${port}/health`);
      console.log('');
      resolve(server);
    });
  });
}

main().catch((error) => {
  console.error('💥 Failed to start API:', error);
  process.exit(1);
});
