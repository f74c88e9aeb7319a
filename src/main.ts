import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { EsimExceptionFilter } from './core/errors/esim-exception.filter';
import { errorMessage } from './core/errors/esim.errors';
import { logger } from './core/logger/logger.config';

async function bootstrap() {
  const pinoLogger = logger();

  try {
    const app = await NestFactory.create(AppModule, {
      logger: false,
    });

    const configService = app.get(ConfigService);

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        transformOptions: {
          enableImplicitConversion: true,
        },
      }),
    );
    app.useGlobalFilters(new EsimExceptionFilter(app.get(HttpAdapterHost)));

    app.setGlobalPrefix('api');
    app.enableShutdownHooks();

    const port = Number(configService.get<number | string>('PORT', 3001));
    await app.listen(port);

    pinoLogger.info(`Application running on: http://localhost:${port}`);
  } catch (error) {
    pinoLogger.error(
      {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Bootstrap failed',
    );
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error({ error: errorMessage(error) }, 'Failed to start application');
  process.exit(1);
});
