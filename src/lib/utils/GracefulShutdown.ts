import { ILogger } from "../logger/ILogger";
import { IMailStore } from "../../Repository/IMailStore";

export interface ShutdownHooks {
    stopLoop: () => void;
    mailStore: IMailStore;
    closeContext?: () => Promise<void>;
    exit: (code: number) => void;
}

export const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Runs the shutdown sequence once: stop the loop, log out of the mailbox, close the
 * application context, exit 0. Signals arriving while it runs are ignored.
 */
export class GracefulShutdown {
    private shuttingDown = false;

    constructor(
        private readonly logger: ILogger,
        private readonly hooks: ShutdownHooks
    ) { }

    register(target: NodeJS.EventEmitter = process): void {
        for (const signal of SHUTDOWN_SIGNALS) {
            target.on(signal, () => {
                this.handle(signal).catch(error => {
                    this.logger.error(`Shutdown failed: ${error}`);
                    this.hooks.exit(1);
                });
            });
        }
    }

    get inProgress(): boolean {
        return this.shuttingDown;
    }

    async handle(signal: NodeJS.Signals): Promise<void> {
        if (this.shuttingDown) {
            this.logger.debug(`Ignoring ${signal}, shutdown already in progress`);
            return;
        }
        this.shuttingDown = true;

        this.logger.info(`Received shutdown signal ${signal}, stopping service...`);
        this.hooks.stopLoop();

        try {
            await this.hooks.mailStore.logout();
        } catch (error) {
            this.logger.error(`Error during IMAP logout: ${error}`);
        }

        if (this.hooks.closeContext) {
            try {
                await this.hooks.closeContext();
            } catch (error) {
                this.logger.error(`Error closing application context: ${error}`);
            }
        }

        this.hooks.exit(0);
    }
}
