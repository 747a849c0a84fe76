/**
 * Server Entry Point
 * Initializes the Express server
 */

import { createServer } from 'http';
import { createApp } from './app';
import { FRAMEWORK_PROFILES } from './lib/frameworks';
import { patternScanner } from './lib/scanner';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  try {
    console.log(`🧩 Loaded ${FRAMEWORK_PROFILES.length} framework profiles`);
    console.log(`🔎 Scanner strategies: ${patternScanner.getStrategyNames().join(', ')}`);

    // Create Express app
    const app = createApp();

    // Create HTTP server
    const httpServer = createServer(app);

    // Start server
    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log(`🚀 Markup Scout Server is running`);
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      console.log(`${signal} signal received: closing HTTP server`);
      httpServer.close(() => {
        console.log('HTTP server closed');
        process.exit(0);
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();
