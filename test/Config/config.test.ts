import path from 'path';
import { DEFAULT_DRAFT_FOLDERS, loadConfig, loadStorageConfig } from '../../src/Config/config';
import { ConfigError } from '../../src/Config/errors';

const baseEnv = {
    EMAIL: 'me@example.com',
    PASSWORD: 'test-password',
    IMAP_SERVER: 'imap.example.com',
    OPENAI_MODEL_NAME: 'gpt-4o-mini',
    OPENAI_API_KEY: 'test-secret',
};

describe('loadConfig', () => {
    it('should apply defaults for every optional setting', () => {
        const config = loadConfig(baseEnv);

        expect(config).toEqual({
            email: 'me@example.com',
            imap: {
                host: 'imap.example.com',
                port: 993,
                secure: true,
                user: 'me@example.com',
                password: 'test-password',
            },
            blacklist: [],
            markAsRead: true,
            systemPrompt: '',
            draftFolders: DEFAULT_DRAFT_FOLDERS,
            pollIntervalSeconds: 300,
            cooldownSeconds: 60,
            dataDir: path.resolve('data'),
            backend: {
                provider: 'openai',
                apiKey: 'test-secret',
                model: { modelName: 'gpt-4o-mini', maxTokens: 1000, temperature: 0.7 },
            },
        });
    });

    it('should parse lists, flags and numbers', () => {
        const config = loadConfig({
            ...baseEnv,
            BLACKLIST: ' Spam.com , , NoReply@ ',
            MARK_AS_READ: 'false',
            IMAP_PORT: '143',
            IMAP_SECURE: 'no',
            DRAFT_FOLDERS: 'Brouillons,Drafts',
            MAX_TOKENS: '500',
            TEMPERATURE: '0.2',
        });

        expect(config.blacklist).toEqual(['spam.com', 'noreply@']);
        expect(config.markAsRead).toBe(false);
        expect(config.imap.port).toBe(143);
        expect(config.imap.secure).toBe(false);
        expect(config.draftFolders).toEqual(['Brouillons', 'Drafts']);
        expect(config.backend.model).toEqual({ modelName: 'gpt-4o-mini', maxTokens: 500, temperature: 0.2 });
    });

    it('should not share the default draft folder list between configurations', () => {
        const config = loadConfig(baseEnv);
        config.draftFolders.push('Custom');

        expect(DEFAULT_DRAFT_FOLDERS).toEqual(['Drafts', 'Draft', '[Gmail]/Drafts', 'INBOX/Drafts']);
    });

    it('should reject a missing required field', () => {
        const { EMAIL: _email, ...env } = baseEnv;

        expect(() => loadConfig(env)).toThrow(ConfigError);
        expect(() => loadConfig(env)).toThrow(/^Missing or invalid configuration: EMAIL: /);
    });

    it('should reject an unrecognised boolean', () => {
        expect(() => loadConfig({ ...baseEnv, MARK_AS_READ: 'maybe' }))
            .toThrow('Missing or invalid configuration: MARK_AS_READ: expected a boolean, got "maybe"');
    });

    it('should require the API key of a configured model', () => {
        const env = { ...baseEnv, CLAUDE_MODEL_NAME: 'claude-test' };

        expect(() => loadConfig(env))
            .toThrow('Anthropic API key (ANTHROPIC_API_KEY) is required when CLAUDE_MODEL_NAME is set');
    });

    it('should pick the first configured backend in order', () => {
        const config = loadConfig({
            EMAIL: 'me@example.com',
            PASSWORD: 'test-password',
            IMAP_SERVER: 'imap.example.com',
            GEMINI_MODEL_NAME: 'gemini-test',
            GOOGLE_API_KEY: 'test-google-key',
            CLAUDE_MODEL_NAME: 'claude-test',
            ANTHROPIC_API_KEY: 'test-anthropic-key',
        });

        expect(config.backend.provider).toBe('anthropic');
        expect(config.backend.model.modelName).toBe('claude-test');
    });

    it('should require at least one model', () => {
        expect(() => loadConfig({ EMAIL: 'me@example.com', PASSWORD: 'test-password', IMAP_SERVER: 'imap.example.com' }))
            .toThrow(/^No AI model specified in configuration/);
    });
});

describe('loadStorageConfig', () => {
    it('should need only the storage settings', () => {
        expect(loadStorageConfig({ SYSTEM_PROMPT: 'Be kind.', DATA_DIR: 'state' })).toEqual({
            systemPrompt: 'Be kind.',
            dataDir: path.resolve('state'),
        });
    });
});
