#!/usr/bin/env node
import 'reflect-metadata';
import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { loadStorageConfig } from '../Config/config';
import { WinstonLogger } from '../lib/logger/WinstonLogger';
import { HEALTH_FILE, HealthSnapshotSchema } from '../lib/health/ServiceHealth';
import { ContextStore } from '../Repository/ContextStore';
import { JsonDocumentFile } from '../Repository/JsonDocumentFile';

const USAGE = `Usage:
  train instruction "<text>"     append an instruction to the training context
  train example <file.json>      append an example response ({ sender, subject, content, response })
  train show                     print training, history and health summaries`;

const ExampleFileSchema = z.object({
    sender: z.string().min(1),
    subject: z.string(),
    content: z.string(),
    response: z.string().min(1),
});

export async function run(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    const [command, ...rest] = args;
    const storage = loadStorageConfig(env);
    const logger = new WinstonLogger({ consoleOnly: true, level: env.LOG_LEVEL });
    const store = new ContextStore(storage, logger);
    await store.load();

    switch (command) {
        case 'instruction': {
            const text = rest.join(' ').trim();
            if (!text) {
                console.error(USAGE);
                return 1;
            }
            await store.addInstruction(text);
            return 0;
        }
        case 'example': {
            if (!rest[0]) {
                console.error(USAGE);
                return 1;
            }
            const data = await fs.readFile(path.resolve(rest[0]), 'utf8');
            const example = ExampleFileSchema.parse(JSON.parse(data));
            await store.addExampleResponse(
                { sender: example.sender, subject: example.subject, body: example.content },
                example.response
            );
            return 0;
        }
        case 'show': {
            const context = store.getTrainingContext();
            console.log(`Data directory: ${storage.dataDir}`);
            console.log(`Instructions: ${context.additionalInstructions.length}`);
            console.log(`Example responses: ${context.exampleResponses.length}`);
            console.log(`Senders with history: ${store.knownSenders().length}`);
            const health = await new JsonDocumentFile(path.join(storage.dataDir, HEALTH_FILE), HealthSnapshotSchema).read();
            console.log(health ? `Service health: ${JSON.stringify(health, null, 2)}` : 'Service health: no snapshot yet');
            return 0;
        }
        default:
            console.error(USAGE);
            return 1;
    }
}

if (require.main === module) {
    dotenv.config();
    run(process.argv.slice(2))
        .then(code => process.exit(code))
        .catch((error: unknown) => {
            console.error(`Error: ${error}`);
            process.exit(1);
        });
}
