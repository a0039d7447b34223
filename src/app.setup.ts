import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { ZodValidationPipe } from 'nestjs-zod';

import { TransformInterceptor } from './common/interceptors/transform.interceptor';

export const API_PREFIX = 'api';

/**
 * Global prefix, response envelope and validation, shared by the server
 * bootstrap and the e2e tests.
 */
export function configureApp(app: NestFastifyApplication): NestFastifyApplication {
  app.setGlobalPrefix(API_PREFIX, { exclude: ['metrics'] });
  app.useGlobalInterceptors(new TransformInterceptor());
  app.useGlobalPipes(new ZodValidationPipe());
  return app;
}
