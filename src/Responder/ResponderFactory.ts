import { ChatOpenAI } from "@langchain/openai";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { Inject, Injectable } from "@nestjs/common";
import { ResponderBackendConfig } from "../Config/config";
import { ConfigError } from "../Config/errors";
import { ILogger } from "../lib/logger/ILogger";
import { IResponder } from "./IResponder";
import { LLMResponder } from "./LLMResponder";

@Injectable()
export class ResponderFactory {
    constructor(@Inject("ILogger") private readonly logger: ILogger) { }

    /**
     * Creates the responder for whichever backend the configuration selected.
     */
    createResponder(backend: ResponderBackendConfig): IResponder {
        if (!backend.apiKey) {
            throw new ConfigError(`API key is required for the ${backend.provider} backend`);
        }
        switch (backend.provider) {
            case "openai":
                return this.createResponderOpenAI(backend.apiKey);
            case "anthropic":
                return this.createResponderAnthropic(backend.apiKey);
            case "gemini":
                return this.createResponderGemini(backend.apiKey);
        }
    }

    createResponderOpenAI(apiKey: string): IResponder {
        return new LLMResponder("openai", modelConfig => new ChatOpenAI({
            model: modelConfig.modelName,
            temperature: modelConfig.temperature,
            maxTokens: modelConfig.maxTokens,
            apiKey,
        }), this.logger);
    }

    createResponderAnthropic(apiKey: string): IResponder {
        return new LLMResponder("anthropic", modelConfig => new ChatAnthropic({
            model: modelConfig.modelName,
            temperature: modelConfig.temperature,
            maxTokens: modelConfig.maxTokens,
            apiKey,
        }), this.logger);
    }

    createResponderGemini(apiKey: string): IResponder {
        return new LLMResponder("gemini", modelConfig => new ChatGoogleGenerativeAI({
            model: modelConfig.modelName,
            temperature: modelConfig.temperature,
            maxOutputTokens: modelConfig.maxTokens,
            apiKey,
        }), this.logger);
    }
}
