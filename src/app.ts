import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRateLimiter, RateLimitOptions } from './middleware/rate-limit.middleware';
import { createRoutes } from './routes';
import { Services } from './services';
import { allowedOrigins, env } from './config/environment';
import { logger } from './config/logger';
import { swaggerSpec } from './swagger/swagger.config';

export interface AppOptions {
  rateLimit?: RateLimitOptions;
}

const SWAGGER_UI_VERSION = '5.11.0';

const docsPage = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Store API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui.css">
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({ url: '/openapi.json', dom_id: '#swagger-ui', persistAuthorization: true });
    };
  </script>
</body>
</html>`;

/**
 * Creates and configures the Express application around the given services
 */
export function createApp(services: Services, options: AppOptions = {}): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Swagger UI loads from a CDN
  }));

  app.use(cors({
    origin: allowedOrigins(),
    credentials: true,
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  app.use(
    createRateLimiter(
      options.rateLimit ?? {
        enabled: env.RATE_LIMIT_ENABLED,
        windowMs: env.RATE_LIMIT_WINDOW_MS,
        max: env.RATE_LIMIT_MAX,
      }
    )
  );

  app.get('/docs', (_req, res) => {
    res.send(docsPage);
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  app.use('/', createRoutes(services));

  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured');

  return app;
}
