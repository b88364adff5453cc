import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const logger = new Logger('Bootstrap');

  const config = new DocumentBuilder()
    .setTitle('Maternal Care Booking API')
    .setDescription('Doctor availability, slot booking and patient appointments')
    .setVersion('1.0')
    .addBearerAuth()
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const configService = app.get(ConfigService);
  if (!configService.get<string>('doctorModule.url')) {
    logger.warn('DOCTOR_MODULE_URL is not set; slot validation and booking will fail');
  }

  const port = configService.get<number>('port') ?? 3000;
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
