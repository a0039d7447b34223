import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { cleanupOpenApiDoc } from 'nestjs-zod';

import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { LogLevelName, resolveLogLevels } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  app.useLogger(resolveLogLevels(configService.getOrThrow<LogLevelName>('LOG_LEVEL')));

  configureApp(app);
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Table Designer')
    .setDescription('Declarative table designs synchronized into a live SQLite schema')
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, cleanupOpenApiDoc(document));

  await app.listen(configService.getOrThrow<number>('PORT'), '0.0.0.0');
}

void bootstrap();
