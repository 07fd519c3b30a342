export interface InstructionEntry {
    timestamp: string;
    instruction: string;
}

export interface ExampleResponse {
    timestamp: string;
    sender: string;
    subject: string;
    originalContent: string;
    response: string;
}

export interface TrainingContext {
    systemPrompt: string;
    additionalInstructions: InstructionEntry[];
    exampleResponses: ExampleResponse[];
}

export interface ConversationEntry {
    timestamp: string;
    subject: string;
    content: string;
    response: string;
}

/** Sender address -> chronologically ordered interactions. */
export type ConversationHistory = Record<string, ConversationEntry[]>;

export const NO_HISTORY = Symbol('NO_HISTORY');
export type NoHistory = typeof NO_HISTORY;

export type RelevantHistory = ConversationEntry[] | NoHistory;
