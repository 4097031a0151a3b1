import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadAppConfig, logLevelsFor } from './config/app.config';

async function bootstrap() {
    const config = loadAppConfig();
    const app = await NestFactory.create(AppModule, { logger: logLevelsFor(config.logLevel) });
    app.enableShutdownHooks();
    await app.listen(config.port);
    Logger.log(`Repository registry listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
    Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap');
    process.exit(1);
});
