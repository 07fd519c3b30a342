import { Injectable } from "@nestjs/common";
import { IncomingMessage } from "../models/IncomingMessage";
import { ExampleResponse, NO_HISTORY, RelevantHistory, TrainingContext } from "../models/TrainingContext";

export const EXAMPLE_LIMIT = 5;
export const NO_HISTORY_TEXT = "No previous conversations found.";

export interface PromptPayload {
    /** Sent on the responder's instruction channel. */
    systemPrompt: string;
    userContent: string;
}

/**
 * Builds the prompt for one message from the stored training context and the sender's history.
 * Identical stored state always yields an identical payload.
 */
@Injectable()
export class ContextAssembler {
    assemble(message: IncomingMessage, trainingContext: Readonly<TrainingContext>, history: RelevantHistory): PromptPayload {
        const blocks = [
            this.renderExamples(trainingContext.exampleResponses),
            this.renderHistory(history),
            this.renderMessage(message),
        ].filter(block => block.length > 0);

        return {
            systemPrompt: this.renderSystemPrompt(trainingContext),
            userContent: blocks.join("\n\n"),
        };
    }

    renderSystemPrompt(trainingContext: Readonly<TrainingContext>): string {
        if (trainingContext.additionalInstructions.length === 0) {
            return trainingContext.systemPrompt;
        }
        const instructions = trainingContext.additionalInstructions
            .map(entry => `- ${entry.instruction}`)
            .join("\n");
        return `${trainingContext.systemPrompt}\n\nAdditional Instructions:\n${instructions}`;
    }

    renderExamples(examples: readonly ExampleResponse[]): string {
        const recent = mostRecentExamples(examples, EXAMPLE_LIMIT);
        if (recent.length === 0) {
            return "";
        }
        const rendered = recent.map(example => [
            `Subject: ${example.subject}`,
            `Original: ${example.originalContent}`,
            `Response: ${example.response}`,
        ].join("\n"));
        return `Recent example responses:\n\n${rendered.join("\n\n")}`;
    }

    renderHistory(history: RelevantHistory): string {
        const header = "Previous conversations with this sender:";
        if (history === NO_HISTORY || history.length === 0) {
            return `${header}\n${NO_HISTORY_TEXT}`;
        }
        const rendered = history.map(entry => [
            `Subject: ${entry.subject}`,
            `Original: ${entry.content}`,
            `Response: ${entry.response}`,
        ].join("\n"));
        return `${header}\n${rendered.join("\n\n")}`;
    }

    renderMessage(message: IncomingMessage): string {
        return [
            "New email to respond to:",
            `From: ${message.sender}`,
            `Subject: ${message.subject}`,
            `Content: ${message.body}`,
        ].join("\n");
    }
}

/**
 * Newest first; examples sharing a timestamp keep their storage order.
 */
export function mostRecentExamples(examples: readonly ExampleResponse[], limit: number): ExampleResponse[] {
    return examples
        .map((example, index) => ({ example, index, time: Date.parse(example.timestamp) }))
        .sort((a, b) => (b.time - a.time) || (a.index - b.index))
        .slice(0, Math.max(0, limit))
        .map(({ example }) => example);
}
