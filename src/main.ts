import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { logConfigurationSummary } from './config/config.utils';
import { getErrorMessage, getErrorStack } from './shared/error.utils';
import type { StewardConfiguration } from './config/config.types';
import { DEFAULT_API_HOST, DEFAULT_API_PORT } from './config/config.constants';

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

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true, // Strip properties not in DTO
        forbidNonWhitelisted: true, // Reject requests with extra properties
        transform: true, // Transform payloads to DTO instances
      }),
    );

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const host = config.get<string>('steward.api.host') ?? DEFAULT_API_HOST;
    const port = config.get<number>('steward.api.port') ?? DEFAULT_API_PORT;
    const environment = config.get<string>('steward.environment');

    if (environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const stewardConfig = config.get<StewardConfiguration>('steward');
      if (stewardConfig) {
        logConfigurationSummary(stewardConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('cert-steward API')
        .setDescription('Management API of the certificate issuance and renewal daemon.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    // listen() runs the bootstrap hooks, which dispatch the install event
    await app.listen(port, host);
    logger.log(`Management API listening on ${host}:${port}`);
  } catch (error) {
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, getErrorStack(error));
    process.exit(1);
  }
}
bootstrap().catch((error: unknown) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
