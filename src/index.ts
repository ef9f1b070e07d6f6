import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { checkRedisHealth, connectRedis, disconnectRedis } from './config/redis';
import { logger } from './utils/logger';
import { toError } from './utils/errors';
import { errorHandler } from './middleware/errorHandler';
import webhookRoutes from './routes/webhook.routes';
import chatRoutes from './routes/chat.routes';
import reservationRoutes from './routes/reservation.routes';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const app = express();

// Middleware
app.use(helmet());
app.use(cors());

// Twilio webhooks are form-encoded
app.use('/webhook', express.urlencoded({ extended: false }));
app.use(express.json());

// Rate limiting
const limiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
});
app.use('/api', limiter);

// Routes
app.use('/webhook', webhookRoutes);
app.use('/api/chat', chatRoutes);
app.use('/api/reservations', reservationRoutes);

app.get('/health', async (_req, res) => {
  const redis = env.SESSION_STORE === 'redis' ? await checkRedisHealth() : { status: 'disabled' };
  res.json({ status: 'ok', redis, timestamp: new Date().toISOString() });
});

// Error handler
if (env.SENTRY_DSN) {
  Sentry.setupExpressErrorHandler(app);
}
app.use(errorHandler);

// Start
async function start() {
  try {
    if (env.SESSION_STORE === 'redis') {
      await connectRedis();
    }

    const server = app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV, sessionStore: env.SESSION_STORE });
    });

    process.once('SIGTERM', () => {
      logger.info('Shutting down');
      server.close(() => {
        disconnectRedis()
          .catch((error: unknown) => logger.warn('Redis disconnect failed', { error: toError(error).message }))
          .finally(() => process.exit(0));
      });
    });
  } catch (error: unknown) {
    logger.error('Failed to start server', { error: toError(error).message });
    process.exit(1);
  }
}

void start();

export default app;
