export type ProcessingStage = 'respond' | 'publish' | 'record' | 'flag';

export interface PublishedOutcome {
    status: 'published';
    messageId: string;
    sender: string;
    subject: string;
    response: string;
    draftFolder: string;
    markedRead: boolean;
}

export interface FailedOutcome {
    status: 'failed';
    messageId: string;
    sender: string;
    subject: string;
    stage: ProcessingStage;
    reason: string;
}

export type ProcessingOutcome = PublishedOutcome | FailedOutcome;

export interface CycleReport {
    startedAt: Date;
    finishedAt: Date;
    outcomes: ProcessingOutcome[];
    published: number;
    failed: number;
}
