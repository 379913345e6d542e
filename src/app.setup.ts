import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import { OptimizerConfig } from './config/config';
import { ApiExceptionFilter } from './common/http-exception.filter';
import { createValidationPipe } from './common/validation';

/**
 * Global middleware, pipes and filters shared by the server bootstrap and
 * the HTTP tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  const configService = app.get(ConfigService);
  const environment = configService.get<string>('NODE_ENV', 'development');
  const { exposeErrorDetails } = configService.getOrThrow<OptimizerConfig>('optimizer');

  app.use(
    helmet({
      contentSecurityPolicy:
        environment === 'production'
          ? {
              directives: {
                defaultSrc: [`'self'`],
                scriptSrc: [`'self'`, `'unsafe-inline'`, 'cdn.jsdelivr.net'],
                styleSrc: [`'self'`, `'unsafe-inline'`, 'data:'],
              },
            }
          : false,
    }),
  );

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new ApiExceptionFilter(exposeErrorDetails));

  const corsOrigins = configService.get<string>('CORS_ORIGINS', '*').split(',');
  app.enableCors({
    origin: corsOrigins.length === 1 && corsOrigins[0] === '*' ? '*' : corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'X-Requested-With'],
    maxAge: 86400,
  });

  return app;
}
