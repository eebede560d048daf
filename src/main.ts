import 'reflect-metadata';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { gatewayConfig } from './config/gateway.config';
import { StructuredLogger } from './logging/structured-logger.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  // swap out Nest's default logger with our structured implementation
  app.useLogger(app.get(StructuredLogger));
  app.enableShutdownHooks();

  const config = app.get<ConfigType<typeof gatewayConfig>>(gatewayConfig.KEY);

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Access Gateway API')
      .setDescription(
        'Token issuance, client fingerprinting, rate limiting and role authorization',
      )
      .setVersion('0.1.0')
      .addTag('Authentication')
      .addTag('Account')
      .addBearerAuth()
      .addApiKey(
        { type: 'apiKey', in: 'header', name: config.clientContext.clientIdHeader },
        'client-id',
      )
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(config.port);
}

bootstrap().catch((error: unknown) => {
  new StructuredLogger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
