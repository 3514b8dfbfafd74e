import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { Server, ServerOptions } from 'socket.io';
import { AppModule } from './app.module';
import { environment } from './config/environment';
import { WinstonLoggerService } from './common/logger';

class ExtendedIoAdapter extends IoAdapter {
  createIOServer(port: number, options?: ServerOptions): Server {
    return super.createIOServer(port, {
      ...options,
      path: environment.socket.path,
      cors: {
        origin: environment.cors.origins,
        methods: environment.cors.methods,
        credentials: environment.socket.credentials,
      },
    });
  }
}

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(new WinstonLoggerService());

  logger.log('====================================');
  logger.log('PLAYER SERVICE STARTING');
  logger.log(`Process ID: ${process.pid}`);
  logger.log(`Environment: ${process.env.NODE_ENV || 'development'}`);
  logger.log('====================================');

  app.enableCors({
    origin: environment.cors.origins,
    methods: environment.cors.methods,
    credentials: true,
  });

  app.useWebSocketAdapter(new ExtendedIoAdapter(app));
  app.setGlobalPrefix(environment.apiPrefix);

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );

  // mpv is stopped from PlayerService.onModuleDestroy
  app.enableShutdownHooks();

  await app.listen(environment.port);
  logger.log(`Server running on port ${environment.port}`);
  logger.log(`API endpoint: http://localhost:${environment.port}/${environment.apiPrefix}`);
}

bootstrap().catch((error) => {
  new Logger('Bootstrap').error('Error during application startup', error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
