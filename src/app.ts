import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import morgan from 'morgan';

import { env } from './config/env.js';
import type { Container } from './container.js';
import { createRateLimiters } from './middleware/rateLimiter.js';
import { csrfProtection } from './middleware/csrf.js';
import { createAuthenticate, createRequireProfile } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { logger } from './utils/logger.js';
import { ErrorCode } from './utils/appError.js';

import { createAuthController, issueCsrfCookie } from './modules/auth/auth.controller.js';
import { createAuthRoutes } from './modules/auth/auth.routes.js';
import { createProfileController } from './modules/profile/profile.controller.js';
import { createProfileRoutes } from './modules/profile/profile.routes.js';

export function createApp(container: Container): Express {
  const app = express();
  app.set('trust proxy', 1);

  // ── Security Headers ──
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          connectSrc: ["'self'", env.CORS_ORIGIN],
          objectSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      hsts: { maxAge: 31536000, includeSubDomains: true },
    }),
  );

  // ── CORS ──
  app.use(
    cors({
      origin: env.CORS_ORIGIN.split(',').map((o) => o.trim()),
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-CSRF-Token'],
    }),
  );

  // ── Body Parsing ──
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true, limit: '100kb' }));
  app.use(cookieParser());

  // ── HTTP Logging ──
  const morganStream = {
    write: (message: string) => logger.http(message.trim()),
  };
  app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', { stream: morganStream }));

  const limiters = createRateLimiters();
  app.use(limiters.apiLimiter);

  const prefix = env.API_PREFIX;

  // ── CSRF Token Endpoint (before csrf protection) ──
  app.get(`${prefix}/csrf-token`, (_req, res) => {
    const csrfToken = issueCsrfCookie(res);
    res.json({ success: true, data: { csrfToken } });
  });

  app.use(csrfProtection);

  // ── Health Check ──
  app.get(`${prefix}/health`, (_req, res) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        store: env.STORE_DRIVER,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // ── API Routes ──
  const authenticate = createAuthenticate(container);
  const requireProfile = createRequireProfile(container.profiles);
  const authController = createAuthController(container);

  app.use(
    `${prefix}/auth`,
    createAuthRoutes(authController, { authenticate, limiters, otpLength: container.otp.length }),
  );
  app.get(`${prefix}/home`, authenticate, authController.home);
  app.use(
    `${prefix}/profile`,
    createProfileRoutes(createProfileController(container.profiles), { authenticate, requireProfile }),
  );

  // ── 404 Handler ──
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: { code: ErrorCode.NOT_FOUND, message: 'Route not found' },
    });
  });

  // ── Global Error Handler ──
  app.use(errorHandler);

  return app;
}
