import { z } from "zod";
import { CycleReport } from "../../models/ProcessingOutcome";
import { ILogger } from "../logger/ILogger";

export const HEALTH_FILE = "health.json";

/**
 * Receives the processing loop's cycle results.
 */
export interface HealthReporter {
    cycleCompleted(report: CycleReport): Promise<void>;
    cycleFailed(error: unknown): Promise<void>;
}

export interface HealthSnapshot {
    status: "healthy" | "degraded";
    startedAt: string;
    uptimeSeconds: number;
    cyclesCompleted: number;
    consecutiveFailures: number;
    lastCycleAt: string | null;
    lastCycle: { published: number, failed: number } | null;
    lastError: { time: string, message: string } | null;
}

export const HealthSnapshotSchema: z.ZodType<HealthSnapshot> = z.object({
    status: z.enum(["healthy", "degraded"]),
    startedAt: z.string(),
    uptimeSeconds: z.number(),
    cyclesCompleted: z.number(),
    consecutiveFailures: z.number(),
    lastCycleAt: z.string().nullable(),
    lastCycle: z.object({ published: z.number(), failed: z.number() }).nullable(),
    lastError: z.object({ time: z.string(), message: z.string() }).nullable(),
});

export interface HealthSink {
    write(snapshot: HealthSnapshot): Promise<void>;
}

/**
 * Health record owned by the supervising process and fed by the processing loop.
 */
export class ServiceHealth implements HealthReporter {
    private readonly startedAt: Date;
    private cyclesCompleted = 0;
    private consecutiveFailures = 0;
    private lastCycleAt: Date | null = null;
    private lastCycle: { published: number, failed: number } | null = null;
    private lastError: { time: Date, message: string } | null = null;

    constructor(
        private readonly logger: ILogger,
        private readonly sink?: HealthSink,
        private readonly now: () => Date = () => new Date()
    ) {
        this.startedAt = this.now();
    }

    async cycleCompleted(report: CycleReport): Promise<void> {
        this.cyclesCompleted += 1;
        this.consecutiveFailures = 0;
        this.lastCycleAt = report.finishedAt;
        this.lastCycle = { published: report.published, failed: report.failed };
        await this.flush();
    }

    async cycleFailed(error: unknown): Promise<void> {
        this.consecutiveFailures += 1;
        this.lastError = {
            time: this.now(),
            message: error instanceof Error ? error.message : `${error}`,
        };
        await this.flush();
    }

    snapshot(): HealthSnapshot {
        const now = this.now();
        return {
            status: this.consecutiveFailures === 0 ? "healthy" : "degraded",
            startedAt: this.startedAt.toISOString(),
            uptimeSeconds: Math.floor((now.getTime() - this.startedAt.getTime()) / 1000),
            cyclesCompleted: this.cyclesCompleted,
            consecutiveFailures: this.consecutiveFailures,
            lastCycleAt: this.lastCycleAt ? this.lastCycleAt.toISOString() : null,
            lastCycle: this.lastCycle,
            lastError: this.lastError
                ? { time: this.lastError.time.toISOString(), message: this.lastError.message }
                : null,
        };
    }

    private async flush(): Promise<void> {
        if (!this.sink) {
            return;
        }
        try {
            await this.sink.write(this.snapshot());
        } catch (error) {
            this.logger.warn(`Unable to write health snapshot: ${error}`);
        }
    }
}
