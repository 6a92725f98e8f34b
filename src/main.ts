import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { ValidationPipe } from '@nestjs/common';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { LoggingInterceptor, Logger, isAppLogLevel } from './common/interceptors/logging.interceptor';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  const logLevel = configService.getOptional('LOG_LEVEL', 'debug');
  if (isAppLogLevel(logLevel)) {
    Logger.setLevel(logLevel);
  } else {
    Logger.warn(`Unknown LOG_LEVEL '${logLevel}', keeping debug`, 'Bootstrap');
  }

  // Global pipes, filters, and interceptors
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.setGlobalPrefix('api/v1');

  // CORS_ORIGIN is a comma-separated allow list
  const corsEnv = configService.getOptional('CORS_ORIGIN', '');
  const allowedOrigins = corsEnv ? corsEnv.split(',').map((s) => s.trim()) : ['http://localhost:8080'];

  app.enableCors({
    origin: (origin, callback) => {
      // Non-browser clients send no origin
      if (!origin || allowedOrigins.includes(origin)) return callback(null, true);
      return callback(new Error('Not allowed by CORS'));
    },
    methods: 'GET,HEAD,POST,DELETE,OPTIONS',
    credentials: true,
  });

  const config = new DocumentBuilder()
    .setTitle('Quiz Override Import API')
    .setDescription('Bulk import and export of quiz user and group overrides')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = configService.getNumber('PORT', 5000);
  const host = configService.getOptional('HOST', '0.0.0.0');

  await app.listen(port, host);
  Logger.log(`API listening on http://localhost:${port}/api/v1`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start the API', error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
