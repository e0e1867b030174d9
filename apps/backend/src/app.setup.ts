import { INestApplication } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import appConfig from './config/app.config';

/**
 * HTTP-level settings shared by main.ts and the e2e test app.
 */
export function configureApp(app: INestApplication): void {
  const { cors } = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.enableCors({
    origin: cors.allowedOrigins,
    methods: cors.methods,
    allowedHeaders: cors.allowedHeaders,
  });
  app.enableShutdownHooks();
}
