import 'reflect-metadata';
import path from 'path';
import { DynamicModule, Global, Module } from '@nestjs/common';
import { AssistantConfig } from './Config/config';
import { ILogger } from './lib/logger/ILogger';
import { HEALTH_FILE, HealthSnapshotSchema, ServiceHealth } from './lib/health/ServiceHealth';
import { sleep } from './lib/utils/sleep';
import { ImapMailStore } from './Repository/ImapMailStore';
import { ContextStore, ContextStoreOptions } from './Repository/ContextStore';
import { JsonDocumentFile } from './Repository/JsonDocumentFile';
import { ResponderFactory } from './Responder/ResponderFactory';
import { ContextAssembler } from './Prompt/ContextAssembler';
import { MessageExtractor, MessageFilterOptions } from './EmailService/MessageExtractor';
import { DraftPublisher, DraftPublisherOptions } from './EmailService/DraftPublisher';
import { ProcessingLoop, ProcessingLoopOptions } from './EmailService/ProcessingLoop';

@Global()
@Module({})
export class DaemonModule {
    static forRoot(config: AssistantConfig, logger: ILogger): DynamicModule {
        const contextStoreOptions: ContextStoreOptions = {
            dataDir: config.dataDir,
            systemPrompt: config.systemPrompt,
        };
        const filterOptions: MessageFilterOptions = {
            blacklist: config.blacklist,
        };
        const publisherOptions: DraftPublisherOptions = {
            fromAddress: config.email,
            draftFolders: config.draftFolders,
        };
        const loopOptions: ProcessingLoopOptions = {
            modelConfig: config.backend.model,
            markAsRead: config.markAsRead,
            pollIntervalSeconds: config.pollIntervalSeconds,
            cooldownSeconds: config.cooldownSeconds,
        };

        return {
            module: DaemonModule,
            providers: [
                { provide: 'AssistantConfig', useValue: config },
                { provide: 'ILogger', useValue: logger },
                {
                    provide: 'IMailStore',
                    useFactory: (logger: ILogger) => new ImapMailStore(config.imap, logger),
                    inject: ['ILogger']
                },
                { provide: 'ContextStoreOptions', useValue: contextStoreOptions },
                { provide: 'ContextStore', useClass: ContextStore },
                { provide: 'MessageFilterOptions', useValue: filterOptions },
                { provide: 'DraftPublisherOptions', useValue: publisherOptions },
                { provide: 'ProcessingLoopOptions', useValue: loopOptions },
                ResponderFactory,
                {
                    provide: 'IResponder',
                    useFactory: (responderFactory: ResponderFactory) => responderFactory.createResponder(config.backend),
                    inject: [ResponderFactory]
                },
                {
                    provide: ServiceHealth,
                    useFactory: (logger: ILogger) => new ServiceHealth(
                        logger,
                        new JsonDocumentFile(path.join(config.dataDir, HEALTH_FILE), HealthSnapshotSchema)
                    ),
                    inject: ['ILogger']
                },
                { provide: 'HealthReporter', useExisting: ServiceHealth },
                { provide: 'Sleep', useValue: sleep },
                MessageExtractor,
                ContextAssembler,
                DraftPublisher,
                ProcessingLoop,
            ],
            exports: [
                'ILogger',
                'IMailStore',
                'ContextStore',
                'IResponder',
                ServiceHealth,
                ProcessingLoop,
            ]
        };
    }
}
