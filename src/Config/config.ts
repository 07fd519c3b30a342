import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_DRAFT_FOLDERS = ['Drafts', 'Draft', '[Gmail]/Drafts', 'INBOX/Drafts'];

export type ResponderProvider = 'openai' | 'anthropic' | 'gemini';

export interface ModelConfig {
    modelName: string;
    maxTokens: number;
    temperature: number;
}

export interface ResponderBackendConfig {
    provider: ResponderProvider;
    apiKey: string;
    model: ModelConfig;
}

export interface ImapConfig {
    host: string;
    port: number;
    secure: boolean;
    user: string;
    password: string;
}

export interface AssistantConfig {
    email: string;
    imap: ImapConfig;
    blacklist: string[];
    markAsRead: boolean;
    systemPrompt: string;
    draftFolders: string[];
    pollIntervalSeconds: number;
    cooldownSeconds: number;
    dataDir: string;
    backend: ResponderBackendConfig;
}

const commaList = z.string().optional().transform(value =>
    (value ?? '').split(',').map(entry => entry.trim()).filter(entry => entry.length > 0)
);

const booleanFlag = (defaultValue: boolean) => z.string().optional().transform((value, ctx) => {
    if (value === undefined || value.trim() === '') {
        return defaultValue;
    }
    const normalised = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalised)) return true;
    if (['false', '0', 'no'].includes(normalised)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
});

const EnvSchema = z.object({
    EMAIL: z.string().min(1),
    PASSWORD: z.string().min(1),
    IMAP_SERVER: z.string().min(1),
    IMAP_PORT: z.coerce.number().int().positive().default(993),
    IMAP_SECURE: booleanFlag(true),
    BLACKLIST: commaList,
    MARK_AS_READ: booleanFlag(true),
    SYSTEM_PROMPT: z.string().default(''),
    MAX_TOKENS: z.coerce.number().int().positive().default(1000),
    TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(300),
    COOLDOWN_SECONDS: z.coerce.number().positive().default(60),
    DATA_DIR: z.string().min(1).default('data'),
    DRAFT_FOLDERS: commaList,
    OPENAI_MODEL_NAME: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
    CLAUDE_MODEL_NAME: z.string().min(1).optional(),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL_NAME: z.string().min(1).optional(),
    GOOGLE_API_KEY: z.string().min(1).optional(),
});

type Env = z.infer<typeof EnvSchema>;

// Checked in this order; the first configured model name selects the backend.
const BACKENDS: { provider: ResponderProvider, modelKey: keyof Env, apiKeyKey: keyof Env, label: string }[] = [
    { provider: 'openai', modelKey: 'OPENAI_MODEL_NAME', apiKeyKey: 'OPENAI_API_KEY', label: 'OpenAI' },
    { provider: 'anthropic', modelKey: 'CLAUDE_MODEL_NAME', apiKeyKey: 'ANTHROPIC_API_KEY', label: 'Anthropic' },
    { provider: 'gemini', modelKey: 'GEMINI_MODEL_NAME', apiKeyKey: 'GOOGLE_API_KEY', label: 'Google Gemini' },
];

function resolveBackend(env: Env): ResponderBackendConfig {
    for (const { modelKey, apiKeyKey, label } of BACKENDS) {
        const modelName = env[modelKey];
        if (typeof modelName === 'string' && typeof env[apiKeyKey] !== 'string') {
            throw new ConfigError(`${label} API key (${String(apiKeyKey)}) is required when ${String(modelKey)} is set`);
        }
    }

    for (const { provider, modelKey, apiKeyKey } of BACKENDS) {
        const modelName = env[modelKey];
        const apiKey = env[apiKeyKey];
        if (typeof modelName === 'string' && typeof apiKey === 'string') {
            return {
                provider,
                apiKey,
                model: {
                    modelName,
                    maxTokens: env.MAX_TOKENS,
                    temperature: env.TEMPERATURE,
                },
            };
        }
    }

    throw new ConfigError('No AI model specified in configuration (set OPENAI_MODEL_NAME, CLAUDE_MODEL_NAME or GEMINI_MODEL_NAME)');
}

/**
 * Builds the assistant configuration from environment variables.
 * @throws ConfigError when a required field or the selected backend's API key is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Missing or invalid configuration: ${issues}`);
    }
    const values = parsed.data;

    return {
        email: values.EMAIL,
        imap: {
            host: values.IMAP_SERVER,
            port: values.IMAP_PORT,
            secure: values.IMAP_SECURE,
            user: values.EMAIL,
            password: values.PASSWORD,
        },
        blacklist: values.BLACKLIST.map(entry => entry.toLowerCase()),
        markAsRead: values.MARK_AS_READ,
        systemPrompt: values.SYSTEM_PROMPT,
        draftFolders: values.DRAFT_FOLDERS.length > 0 ? values.DRAFT_FOLDERS : [...DEFAULT_DRAFT_FOLDERS],
        pollIntervalSeconds: values.POLL_INTERVAL_SECONDS,
        cooldownSeconds: values.COOLDOWN_SECONDS,
        dataDir: path.resolve(values.DATA_DIR),
        backend: resolveBackend(values),
    };
}

/**
 * Reads `.env` into the process environment, then loads the configuration.
 */
export function loadConfigFromDotenv(): AssistantConfig {
    dotenv.config();
    return loadConfig(process.env);
}

const StorageEnvSchema = z.object({
    SYSTEM_PROMPT: z.string().default(''),
    DATA_DIR: z.string().min(1).default('data'),
});

export interface StorageConfig {
    systemPrompt: string;
    dataDir: string;
}

/**
 * The subset of configuration the training tools need; no mailbox or backend settings required.
 */
export function loadStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
    const parsed = StorageEnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid storage configuration: ${parsed.error.message}`);
    }
    return {
        systemPrompt: parsed.data.SYSTEM_PROMPT,
        dataDir: path.resolve(parsed.data.DATA_DIR),
    };
}
