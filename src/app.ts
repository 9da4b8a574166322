import express from 'express';
import path from 'path';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { config } from './config/env';
import { errorHandler } from './middleware/error.middleware';
import { requestLogger, apiLogger } from './middleware/logger.middleware';
import { generalRateLimiter, apiRateLimiter } from './middleware/rateLimit.middleware';
import { metricsMiddleware, metrics } from './utils/metrics';
import { createGuideRouter } from './routes/guide.routes';
import { GuideService } from './services/guide.service';

export interface AppDependencies {
  guideService: GuideService;
  staticDir?: string;
}

export function createApp({ guideService, staticDir }: AppDependencies) {
  const app = express();

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        // the summary preview is an inline data: PDF
        'frame-src': ["'self'", 'data:'],
      },
    },
  }));
  app.use(compression());
  app.use(cors({
    origin: config.server.corsOrigin,
    exposedHeaders: ['X-Session-Id'],
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  app.use(requestLogger);
  app.use(apiLogger);
  app.use(metricsMiddleware);
  app.use(generalRateLimiter);

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      message: 'Visit Guide API is running',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (req, res) => {
    res.json({
      success: true,
      data: metrics.getMetrics(),
    });
  });

  app.use('/api/guide', apiRateLimiter, createGuideRouter(guideService));

  app.use(express.static(staticDir ?? path.resolve(process.cwd(), 'public')));

  app.use(errorHandler);

  return app;
}
