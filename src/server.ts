/**
 * Server Entry Point
 * Validates config, warms the datasets and starts the HTTP server
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env, validateEnv } from './config/env';
import { ConfigError } from './lib/errors';
import { createServices, shutdownServices } from './services';

const startServer = async (): Promise<void> => {
  try {
    validateEnv(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const services = createServices(env);

  // Warm every dataset once; failures are logged and retried on schedule
  console.log('📦 Warming datasets...');
  await services.scheduler.runNow();
  services.scheduler.start();

  const app = createApp({ config: env, services });
  const httpServer = createServer(app);

  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('🚀 Tide gate API is running');
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 Gate opens at: ${env.GATE_OPEN_HEIGHT}m (${env.SITE_TIMEZONE})`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    shutdownServices(services);
    httpServer.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Start the server
startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
