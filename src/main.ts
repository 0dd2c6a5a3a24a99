import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import type { CertdConfiguration } from './config/config.types';
import { getErrorMessage } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    // Enable global validation pipe for DTO validation
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true, // Strip properties not in DTO
        forbidNonWhitelisted: true, // Reject requests with extra properties
        transform: true, // Transform payloads to DTO instances
      }),
    );

    // Watchers, timers and the store are released through the shutdown hooks
    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const port = config.get<number>('certd.main.port');
    const environment = config.get<string>('certd.environment');

    if (environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      // Log configuration summary in development mode
      const certdConfig = config.get<CertdConfiguration>('certd');
      if (certdConfig) {
        logConfigurationSummary(certdConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('certd API')
        .setDescription('Certificate status, generation and integrity checks.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    if (!port) {
      logger.error('NO HTTP PORT CONFIGURED (CERTD_PORT)');
      await app.close();
      process.exit(1);
    }

    await app.listen(port);
    logger.log(`certd is ready on port ${port}`);
  } catch (error) {
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, errorStack);
    process.exit(1);
  }
}
bootstrap().catch((error: unknown) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
