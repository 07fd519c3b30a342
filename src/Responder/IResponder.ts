import { ModelConfig } from "../Config/config";

/**
 * A text-generation backend. Implementations return their best-effort text and
 * only fail with a ResponderError when the backend itself is unavailable.
 */
export interface IResponder {
    readonly name: string;
    generate(systemPrompt: string, userContent: string, modelConfig: ModelConfig): Promise<string>;
}
