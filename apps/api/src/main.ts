import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig, applyLogLevels, resolveLogLevels } from './config/env.schema';
import { API_VERSION } from './health/health.controller';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { logger: resolveLogLevels() });
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  applyLogLevels(app);

  app.enableCors({ origin: config.get('CORS_ORIGIN', { infer: true }) });
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Playlist API')
      .setDescription('Song catalog with pagination, title search and star ratings')
      .setVersion(API_VERSION)
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  new Logger('Bootstrap').log(
    `Playlist API listening on port ${port} (${config.get('NODE_ENV', { infer: true })})`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
