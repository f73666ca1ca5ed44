import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger as NestLogger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { Logger, LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { API_PREFIX, SERVER_DEFAULTS } from './common/constants/constants';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  Logger.setLevel(configService.get('LOG_LEVEL', 'debug'));

  // Global pipes, filters, and interceptors
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.setGlobalPrefix(API_PREFIX);
  // Store is torn down with the process
  app.enableShutdownHooks();

  // Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Gradebook API')
    .setDescription('Courses, students, grade entry and report cards')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(`${API_PREFIX}/docs`, app, document);

  const port = configService.getNumber('PORT', SERVER_DEFAULTS.PORT);
  const host = configService.get('HOST', SERVER_DEFAULTS.HOST);

  await app.listen(port, host);
  NestLogger.log(`API listening on http://localhost:${port}/${API_PREFIX}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  NestLogger.error('Failed to start', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
