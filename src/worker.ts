#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { loadConfigFromDotenv } from './Config/config';
import { DaemonModule } from './daemon.module';
import { ProcessingLoop } from './EmailService/ProcessingLoop';
import { ILogger } from './lib/logger/ILogger';
import { WinstonLogger } from './lib/logger/WinstonLogger';
import { ServiceHealth } from './lib/health/ServiceHealth';
import { GracefulShutdown } from './lib/utils/GracefulShutdown';
import { ContextStore } from './Repository/ContextStore';
import { IMailStore } from './Repository/IMailStore';
import { IResponder } from './Responder/IResponder';

/**
 * Entry point for the assistant daemon. Any failure before the loop starts
 * (configuration, mailbox login, unreadable state) exits with status 1.
 */
async function main(logger: ILogger): Promise<void> {
    logger.info("Starting Mail Draft Assistant service");

    const config = loadConfigFromDotenv();
    logger.info(`Loaded configuration for email: ${config.email}`);
    logger.info(`Using IMAP server: ${config.imap.host}`);

    const appContext = await NestFactory.createApplicationContext(
        DaemonModule.forRoot(config, logger),
        { logger: ['error', 'warn'], abortOnError: false }
    );

    const mailStore = appContext.get<IMailStore>('IMailStore');
    const contextStore = appContext.get<ContextStore>('ContextStore');
    const responder = appContext.get<IResponder>('IResponder');
    const health = appContext.get(ServiceHealth);

    await mailStore.connect();
    await contextStore.load();
    logger.info(`Initialised ${responder.name} responder with model ${config.backend.model.modelName}`);

    const controller = new AbortController();
    const shutdown = new GracefulShutdown(logger, {
        stopLoop: () => controller.abort(),
        mailStore,
        closeContext: () => appContext.close(),
        exit: code => {
            logger.info("Service stopped", { health: health.snapshot() });
            process.exit(code);
        },
    });
    shutdown.register();

    logger.info("Running Mail Draft Assistant main loop");
    await appContext.get(ProcessingLoop).runForever(controller.signal);
}

const logger = new WinstonLogger();
main(logger).catch((error: unknown) => {
    logger.error(`Fatal error: ${error}`, {
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
