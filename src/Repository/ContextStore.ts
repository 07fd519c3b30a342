import path from 'path';
import { z } from 'zod';
import { Inject, Injectable } from '@nestjs/common';
import { ILogger } from '../lib/logger/ILogger';
import { IncomingMessage } from '../models/IncomingMessage';
import {
    ConversationEntry,
    ConversationHistory,
    NO_HISTORY,
    RelevantHistory,
    TrainingContext,
} from '../models/TrainingContext';
import { JsonDocumentFile } from './JsonDocumentFile';
import { StorageError } from './errors/RepositoryErrors';

export const TRAINING_CONTEXT_FILE = 'training_context.json';
export const CONVERSATION_HISTORY_FILE = 'conversation_history.json';
export const DEFAULT_HISTORY_LIMIT = 5;

export interface ContextStoreOptions {
    dataDir: string;
    /** Seeds the training context the first time it is created. */
    systemPrompt: string;
    now?: () => Date;
}

// Entries are ordered by timestamp, so anything Date.parse cannot read is rejected on load.
const isoTimestamp = z.string().datetime({ offset: true });

const TrainingContextSchema: z.ZodType<TrainingContext> = z.object({
    systemPrompt: z.string(),
    additionalInstructions: z.array(z.object({
        timestamp: isoTimestamp,
        instruction: z.string(),
    })),
    exampleResponses: z.array(z.object({
        timestamp: isoTimestamp,
        sender: z.string(),
        subject: z.string(),
        originalContent: z.string(),
        response: z.string(),
    })),
});

const ConversationHistorySchema: z.ZodType<ConversationHistory> = z.record(z.array(z.object({
    timestamp: isoTimestamp,
    subject: z.string(),
    content: z.string(),
    response: z.string(),
})));

/**
 * Owns the training context and the per-sender conversation history.
 * Both documents are append-only; every mutation persists the whole document before returning.
 */
@Injectable()
export class ContextStore {
    private readonly trainingFile: JsonDocumentFile<TrainingContext>;
    private readonly historyFile: JsonDocumentFile<ConversationHistory>;
    private readonly now: () => Date;
    private trainingContext: TrainingContext | null = null;
    private history: ConversationHistory = {};

    constructor(
        @Inject('ContextStoreOptions') private readonly options: ContextStoreOptions,
        @Inject('ILogger') private readonly logger: ILogger
    ) {
        this.trainingFile = new JsonDocumentFile(path.join(options.dataDir, TRAINING_CONTEXT_FILE), TrainingContextSchema);
        this.historyFile = new JsonDocumentFile(path.join(options.dataDir, CONVERSATION_HISTORY_FILE), ConversationHistorySchema);
        this.now = options.now ?? (() => new Date());
    }

    async load(): Promise<void> {
        const storedContext = await this.trainingFile.read();
        if (storedContext) {
            this.trainingContext = storedContext;
            this.logger.info(`Loaded training context with ${storedContext.additionalInstructions.length} instructions and ${storedContext.exampleResponses.length} examples`);
        } else {
            this.trainingContext = {
                systemPrompt: this.options.systemPrompt,
                additionalInstructions: [],
                exampleResponses: [],
            };
            this.logger.info(`No training context found, seeding ${this.trainingFile.filePath} from configuration`);
            await this.trainingFile.write(this.trainingContext);
        }

        const storedHistory = await this.historyFile.read();
        if (storedHistory) {
            this.history = storedHistory;
            this.logger.info(`Loaded conversation history for ${Object.keys(storedHistory).length} senders`);
        } else {
            this.history = {};
            await this.historyFile.write(this.history);
        }
    }

    getTrainingContext(): Readonly<TrainingContext> {
        return this.requireTrainingContext();
    }

    async persistTrainingContext(): Promise<void> {
        await this.trainingFile.write(this.requireTrainingContext());
    }

    async persistHistory(): Promise<void> {
        await this.historyFile.write(this.history);
    }

    async addInstruction(instruction: string): Promise<void> {
        const context = this.requireTrainingContext();
        context.additionalInstructions.push({
            timestamp: this.timestamp(),
            instruction,
        });
        await this.persistTrainingContext();
        this.logger.info('Added new instruction to training context');
    }

    async addExampleResponse(message: Pick<IncomingMessage, 'sender' | 'subject' | 'body'>, response: string): Promise<void> {
        const context = this.requireTrainingContext();
        context.exampleResponses.push({
            timestamp: this.timestamp(),
            sender: message.sender,
            subject: message.subject,
            originalContent: message.body,
            response,
        });
        await this.persistTrainingContext();
        this.logger.info(`Added example response for "${message.subject}" to training context`);
    }

    async recordInteraction(sender: string, subject: string, content: string, response: string): Promise<void> {
        this.requireTrainingContext();
        const key = sender.toLowerCase();
        const entry: ConversationEntry = { timestamp: this.timestamp(), subject, content, response };
        if (Object.hasOwn(this.history, key)) {
            this.history[key].push(entry);
        } else {
            this.history[key] = [entry];
        }
        await this.persistHistory();
        this.logger.debug(`Recorded interaction with ${key}`, { subject });
    }

    /**
     * @returns the chronologically-last `limit` entries for the sender, oldest first,
     * or NO_HISTORY when nothing has been recorded for them.
     */
    relevantHistory(sender: string, limit: number = DEFAULT_HISTORY_LIMIT): RelevantHistory {
        const key = sender.toLowerCase();
        const entries = Object.hasOwn(this.history, key) ? this.history[key] : [];
        if (entries.length === 0) {
            return NO_HISTORY;
        }
        if (limit <= 0) {
            return [];
        }
        const chronological = [...entries].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
        return chronological.slice(-limit);
    }

    knownSenders(): string[] {
        return Object.keys(this.history);
    }

    private requireTrainingContext(): TrainingContext {
        if (!this.trainingContext) {
            throw new StorageError('ContextStore used before load()');
        }
        return this.trainingContext;
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
