import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { promises as fs } from 'fs';
import { AppModule } from './app.module';
import { StorageService } from './storage/storage.service';

function parseCorsOrigins(): { origins: string[] | true; allowCredentials: boolean } {
  const raw = process.env.CORS_ORIGINS;
  if (!raw) {
    return { origins: true, allowCredentials: false };
  }
  const entries = raw
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  if (!entries.length || entries.includes('*')) {
    return { origins: true, allowCredentials: false };
  }
  return { origins: entries, allowCredentials: true };
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { abortOnError: false });
  const logger = new Logger('Bootstrap');

  const { origins, allowCredentials } = parseCorsOrigins();
  app.enableCors({
    origin: origins,
    credentials: allowCredentials,
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin', 'X-Requested-With'],
  });

  const storage = app.get(StorageService);
  await fs.mkdir(storage.localDirectory, { recursive: true });
  app.useStaticAssets(storage.localDirectory, { prefix: storage.publicPath });

  const port = process.env.PORT ? Number(process.env.PORT) : 8000;
  await app.listen(port, '0.0.0.0');
  logger.log(`HTTP server listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
