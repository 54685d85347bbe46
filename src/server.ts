import http from 'http';
import { createApp } from './app.js';
import { createContainer } from './container.js';
import { env } from './config/env.js';
import { connectDB, disconnectDB } from './config/database.js';
import { createOtpService } from './modules/otp/otp.service.js';
import { logger } from './utils/logger.js';

const container = createContainer();
const server = http.createServer(createApp(container));

let sweepInterval: NodeJS.Timeout | undefined;

function startOtpSweep(): void {
  if (env.OTP_SWEEP_INTERVAL_MINUTES === 0) return;

  const otps = createOtpService({ otps: container.store.otps, config: container.otp });
  sweepInterval = setInterval(() => {
    otps.sweepExpired().catch((error: unknown) => {
      logger.error('Periodic OTP sweep failed:', { error });
    });
  }, env.OTP_SWEEP_INTERVAL_MINUTES * 60 * 1000);
  sweepInterval.unref();
}

async function startServer(): Promise<void> {
  if (env.STORE_DRIVER === 'mongo') {
    await connectDB();
  } else {
    logger.warn('Using the in-memory store; data is lost on restart');
  }

  startOtpSweep();

  server.listen(env.PORT, () => {
    logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
    logger.info(`API prefix: ${env.API_PREFIX}`);
  });
}

// ── Graceful Shutdown ──
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Shutting down gracefully...`);

  if (sweepInterval) {
    clearInterval(sweepInterval);
  }

  server.close(() => {
    logger.info('HTTP server closed');
    const closing = env.STORE_DRIVER === 'mongo' ? disconnectDB() : Promise.resolve();
    closing.then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error closing MongoDB connection:', { error });
        process.exit(1);
      },
    );
  });

  // Force shutdown after 10s
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', { reason });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', { error });
  process.exit(1);
});
