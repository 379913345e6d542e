import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { SERVICE_NAME, SERVICE_VERSION } from './app.service';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  try {
    const app = await NestFactory.create(AppModule, { abortOnError: false });

    const configService = app.get(ConfigService);
    const port = Number(configService.get<string>('PORT', '5000'));
    const environment = configService.get<string>('NODE_ENV', 'development');

    logger.log(`📌 Environment: ${environment}`);
    logger.log(`📌 PORT: ${port}`);
    logger.log(`🛡️ CORS Origins: ${configService.get<string>('CORS_ORIGINS', '*')}`);

    configureApp(app);

    // ======== Swagger =========
    if (environment !== 'production') {
      const swaggerConfig = new DocumentBuilder()
        .setTitle(SERVICE_NAME)
        .setDescription('Rewrites blog post HTML for a focus keyword and estimates the new SEO score')
        .setVersion(SERVICE_VERSION)
        .addServer(`http://localhost:${port}`, 'Local Development')
        .build();

      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api/docs', app, document, {
        explorer: true,
        swaggerOptions: {
          filter: true,
          showRequestDuration: true,
        },
      });
      logger.log(`📚 Swagger UI: http://localhost:${port}/api/docs`);
    }

    await app.listen(port);
    logger.log(`✅ Server listening on http://localhost:${port}`);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('❌ Application startup failed', error.stack);
    process.exit(1);
  }
}
void bootstrap();
