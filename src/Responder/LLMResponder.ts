import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage, type MessageContent } from "@langchain/core/messages";
import { ModelConfig } from "../Config/config";
import { ILogger } from "../lib/logger/ILogger";
import { IResponder } from "./IResponder";
import { ResponderError } from "./errors/ResponderErrors";

export type ChatModelFactory = (modelConfig: ModelConfig) => BaseChatModel;

/**
 * Responder over any langchain chat model. The system prompt travels on the system
 * channel and the assembled context as a single human message.
 */
export class LLMResponder implements IResponder {
    private readonly models = new Map<string, BaseChatModel>();

    constructor(
        readonly name: string,
        private readonly createModel: ChatModelFactory,
        private readonly logger: ILogger
    ) { }

    async generate(systemPrompt: string, userContent: string, modelConfig: ModelConfig): Promise<string> {
        const llm = this.modelFor(modelConfig);
        this.logger.debug(`Requesting completion from ${this.name} model ${modelConfig.modelName}`);

        let content: MessageContent;
        try {
            const response = await llm.invoke([
                new SystemMessage(systemPrompt),
                new HumanMessage(userContent),
            ]);
            content = response.content;
        } catch (error) {
            throw new ResponderError(`${this.name} request failed: ${error}`, this.name);
        }

        return extractText(content);
    }

    private modelFor(modelConfig: ModelConfig): BaseChatModel {
        const key = `${modelConfig.modelName}|${modelConfig.maxTokens}|${modelConfig.temperature}`;
        let llm = this.models.get(key);
        if (!llm) {
            llm = this.createModel(modelConfig);
            this.models.set(key, llm);
        }
        return llm;
    }
}

/**
 * Flattens message content; multi-part content keeps only its text parts, space separated.
 */
export function extractText(content: MessageContent): string {
    if (typeof content === "string") {
        return content;
    }
    return content
        .map(part => (part.type === "text" && "text" in part && typeof part.text === "string" ? part.text : ""))
        .filter(text => text.length > 0)
        .join(" ");
}
