import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { HEALTH_FILE, HealthSnapshot } from '../../src/lib/health/ServiceHealth';
import { TRAINING_CONTEXT_FILE } from '../../src/Repository/ContextStore';
import { run } from '../../src/scripts/train';

// The training tool only needs storage; pulling in the daemon wiring would load every backend.
jest.mock('../../src/daemon.module', () => {
    throw new Error('daemon module loaded by the training tool');
});

describe('train', () => {
    let dataDir: string;
    let env: NodeJS.ProcessEnv;
    let log: jest.SpyInstance;
    let errorLog: jest.SpyInstance;

    beforeEach(async () => {
        dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'train-'));
        env = { DATA_DIR: dataDir, SYSTEM_PROMPT: 'Be kind.', LOG_LEVEL: 'error' };
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        log.mockRestore();
        errorLog.mockRestore();
        await fs.rm(dataDir, { recursive: true, force: true });
    });

    const readTrainingContext = async () =>
        JSON.parse(await fs.readFile(path.join(dataDir, TRAINING_CONTEXT_FILE), 'utf8'));

    it('should append an instruction from the remaining arguments', async () => {
        await expect(run(['instruction', 'Sign', 'as', 'Sam'], env)).resolves.toBe(0);

        const context = await readTrainingContext();
        expect(context.systemPrompt).toBe('Be kind.');
        expect(context.additionalInstructions.map((entry: { instruction: string }) => entry.instruction)).toEqual(['Sign as Sam']);
    });

    it('should append an example response read from a JSON file', async () => {
        const examplePath = path.join(dataDir, 'example.json');
        await fs.writeFile(examplePath, JSON.stringify({
            sender: 'bob@example.com',
            subject: 'Invoice',
            content: 'Is it paid?',
            response: 'Yes, on Friday.',
        }));

        await expect(run(['example', examplePath], env)).resolves.toBe(0);

        const context = await readTrainingContext();
        expect(context.exampleResponses).toEqual([expect.objectContaining({
            sender: 'bob@example.com',
            subject: 'Invoice',
            originalContent: 'Is it paid?',
            response: 'Yes, on Friday.',
        })]);
    });

    it('should show counts and the stored health snapshot', async () => {
        const snapshot: HealthSnapshot = {
            status: 'degraded',
            startedAt: '2025-06-02T09:00:00.000Z',
            uptimeSeconds: 60,
            cyclesCompleted: 0,
            consecutiveFailures: 1,
            lastCycleAt: null,
            lastCycle: null,
            lastError: { time: '2025-06-02T09:01:00.000Z', message: 'connection reset' },
        };
        await fs.writeFile(path.join(dataDir, HEALTH_FILE), JSON.stringify(snapshot));

        await expect(run(['show'], env)).resolves.toBe(0);

        expect(log).toHaveBeenCalledWith('Instructions: 0');
        expect(log).toHaveBeenCalledWith('Example responses: 0');
        expect(log).toHaveBeenCalledWith('Senders with history: 0');
        expect(log).toHaveBeenCalledWith(`Service health: ${JSON.stringify(snapshot, null, 2)}`);
    });

    it('should print usage for an unknown command', async () => {
        await expect(run(['forget'], env)).resolves.toBe(1);

        expect(errorLog).toHaveBeenCalledWith(expect.stringMatching(/^Usage:/));
    });
});
