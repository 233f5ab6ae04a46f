import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConsoleLogger, Logger, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import { envs } from './config/envs';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: new ConsoleLogger({
      prefix: 'PdfQA',
      timestamp: true,
    }),
  });

  app.setGlobalPrefix(envs.apiPrefix);

  const logger = new Logger(bootstrap.name);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.use(helmet());

  app.enableCors({
    origin: envs.corsOrigin,
    credentials: true,
  });

  // Limpia las sesiones vivas al recibir SIGTERM/SIGINT
  app.enableShutdownHooks();

  if (envs.nodeEnv !== 'production') {
    const config = new DocumentBuilder()
      .setTitle('PDF Q&A Sessions API')
      .setDescription(
        'Sube PDF para crear una sesión y conéctate por socket.io (handshake `auth.sessionId`) para preguntar sobre su contenido.',
      )
      .setVersion('1.0')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('docs', app, document, {
      useGlobalPrefix: true,
    });
  }

  await app.listen(envs.port, '0.0.0.0');
  logger.log(`Server running on port ${envs.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('bootstrap').error(
    'No se pudo iniciar la aplicación',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
