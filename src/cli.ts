#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './commands';
import { ConfigStore } from './state/ConfigStore';
import { startTracing, stopTracing } from './tracing';
import { createProvider } from './translation/providers';
dotenv.config();

async function main(): Promise<number> {
    startTracing();
    try {
        return await runCli(process.argv.slice(2), {
            configStore: new ConfigStore(),
            createProvider: config => createProvider(config)
        });
    } finally {
        await stopTracing();
    }
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        console.error('❌ Fatal error:', error);
        process.exitCode = 1;
    });
