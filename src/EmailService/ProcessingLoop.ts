import { Inject, Injectable } from "@nestjs/common";
import { ModelConfig } from "../Config/config";
import { HealthReporter } from "../lib/health/ServiceHealth";
import { ILogger } from "../lib/logger/ILogger";
import { Sleep } from "../lib/utils/sleep";
import { IncomingMessage } from "../models/IncomingMessage";
import { CycleReport, FailedOutcome, ProcessingOutcome, ProcessingStage } from "../models/ProcessingOutcome";
import { ContextAssembler } from "../Prompt/ContextAssembler";
import { ContextStore } from "../Repository/ContextStore";
import { IMailStore, INBOX, SEEN_FLAG, SearchCriteria, UNSEEN_ONLY } from "../Repository/IMailStore";
import { MailStoreConnectionError } from "../Repository/errors/RepositoryErrors";
import { IResponder } from "../Responder/IResponder";
import { DraftPublisher } from "./DraftPublisher";
import { FolderSelectionError } from "./errors/EmailServiceErrors";
import { MessageExtractor } from "./MessageExtractor";

export interface ProcessingLoopOptions {
    modelConfig: ModelConfig;
    markAsRead: boolean;
    pollIntervalSeconds: number;
    cooldownSeconds: number;
    searchCriteria?: SearchCriteria;
}

/**
 * Drives polling cycles: fetch, assemble, respond, publish, record, flag.
 * A message is only flagged read once its draft is saved and its history recorded,
 * so every failure leaves it unseen for the next cycle.
 */
@Injectable()
export class ProcessingLoop {
    constructor(
        @Inject("IMailStore") private readonly mailStore: IMailStore,
        private readonly extractor: MessageExtractor,
        @Inject("ContextStore") private readonly contextStore: ContextStore,
        private readonly assembler: ContextAssembler,
        @Inject("IResponder") private readonly responder: IResponder,
        private readonly publisher: DraftPublisher,
        @Inject("ProcessingLoopOptions") private readonly options: ProcessingLoopOptions,
        @Inject("HealthReporter") private readonly health: HealthReporter,
        @Inject("Sleep") private readonly sleep: Sleep,
        @Inject("ILogger") private readonly logger: ILogger
    ) { }

    /**
     * Runs cycles until the signal aborts. A cycle that throws is followed by a
     * cooldown instead of the regular poll interval; the loop itself never exits on error.
     */
    async runForever(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                const report = await this.runCycle(signal);
                await this.health.cycleCompleted(report);
                this.logger.info(`Cycle finished: ${report.published} drafted, ${report.failed} failed. Next check in ${this.options.pollIntervalSeconds} seconds`);
                await this.sleep(this.options.pollIntervalSeconds * 1000, signal);
            } catch (error) {
                this.logger.error(`Error in processing cycle: ${error}`, {
                    stack: error instanceof Error ? error.stack : undefined,
                });
                await this.health.cycleFailed(error);
                if (signal.aborted) {
                    break;
                }
                this.logger.info(`Restarting in ${this.options.cooldownSeconds} seconds...`);
                await this.sleep(this.options.cooldownSeconds * 1000, signal);
            }
        }
        this.logger.info("Processing loop stopped");
    }

    async runCycle(signal?: AbortSignal): Promise<CycleReport> {
        const startedAt = new Date();
        this.logger.info(`Checking for new emails at ${startedAt.toISOString()}`);
        await this.ensureConnected();

        const outcomes: ProcessingOutcome[] = [];
        for await (const message of this.extractor.fetchCandidates(this.options.searchCriteria ?? UNSEEN_ONLY)) {
            outcomes.push(await this.processMessage(message));
            if (signal?.aborted) {
                this.logger.info("Stop requested, ending cycle early");
                break;
            }
        }

        const published = outcomes.filter(outcome => outcome.status === "published").length;
        return {
            startedAt,
            finishedAt: new Date(),
            outcomes,
            published,
            failed: outcomes.length - published,
        };
    }

    async processMessage(message: IncomingMessage): Promise<ProcessingOutcome> {
        this.logger.info(`Processing email from ${message.sender}`, { subject: message.subject });

        const payload = this.assembler.assemble(
            message,
            this.contextStore.getTrainingContext(),
            this.contextStore.relevantHistory(message.sender)
        );

        let response: string;
        try {
            response = await this.responder.generate(payload.systemPrompt, payload.userContent, this.options.modelConfig);
        } catch (error) {
            return this.fail(message, "respond", error);
        }
        if (response.trim().length === 0) {
            return this.fail(message, "respond", `${this.responder.name} returned an empty response`);
        }

        let folder: string;
        try {
            folder = (await this.publisher.publish(message, response)).folder;
        } catch (error) {
            if (error instanceof FolderSelectionError) {
                throw error;
            }
            this.throwIfDisconnected(error);
            return this.fail(message, "publish", error);
        }

        try {
            await this.contextStore.recordInteraction(message.sender, message.subject, message.body, response);
        } catch (error) {
            return this.fail(message, "record", error);
        }

        if (this.options.markAsRead) {
            try {
                await this.mailStore.setFlag(message.id, SEEN_FLAG);
            } catch (error) {
                this.throwIfDisconnected(error);
                return this.fail(message, "flag", error);
            }
        }

        this.logger.info(`Draft saved for email from ${message.sender}`, { subject: message.subject, folder });
        return {
            status: "published",
            messageId: message.id,
            sender: message.sender,
            subject: message.subject,
            response,
            draftFolder: folder,
            markedRead: this.options.markAsRead,
        };
    }

    /**
     * Reconnects between cycles only; a connection is never rebuilt mid-cycle.
     */
    private async ensureConnected(): Promise<void> {
        if (!this.mailStore.isConnected()) {
            this.logger.warn("Mail connection is not open, reconnecting");
            await this.mailStore.connect();
        }
        await this.mailStore.selectFolder(INBOX);
    }

    private throwIfDisconnected(error: unknown): void {
        if (error instanceof MailStoreConnectionError || !this.mailStore.isConnected()) {
            throw new MailStoreConnectionError(`Mail connection lost: ${error}`);
        }
    }

    private fail(message: IncomingMessage, stage: ProcessingStage, error: unknown): FailedOutcome {
        const reason = error instanceof Error ? error.message : `${error}`;
        this.logger.error(`Failed to ${stage} for email from ${message.sender}: ${reason}`, {
            subject: message.subject,
            uid: message.id,
        });
        return {
            status: "failed",
            messageId: message.id,
            sender: message.sender,
            subject: message.subject,
            stage,
            reason,
        };
    }
}
