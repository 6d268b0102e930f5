import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const config = app.get(ConfigService);

  const swaggerPath = config.get<string>('SWAGGER_PATH') ?? 'docs';
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Checks Runner API')
      .setDescription('Fail-fast checks pipeline triggered by git webhooks')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup(swaggerPath, app, document);

  const port = config.get<number>('PORT') ?? 3000;
  await app.listen(port);
  Logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap');
  process.exit(1);
});
