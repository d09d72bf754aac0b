#!/usr/bin/env node
import { loadValidatedConfig } from './config';
import { describeFailure, exitCodeFor, parseArgs, runAudit, runGenerate, runRender } from './presentation/cli';

async function main(argv: string[]): Promise<number> {
    console.log('📄 Profile Resume Generator');

    const args = parseArgs(argv);
    const config = loadValidatedConfig(process.env, { requireSession: args.command === 'generate' });

    switch (args.command) {
        case 'generate': {
            const controller = new AbortController();
            const onInterrupt = () => {
                console.warn('[Main] Interrupt received, discarding partial data...');
                controller.abort();
            };
            process.once('SIGINT', onInterrupt);
            try {
                return await runGenerate(config, controller.signal);
            } finally {
                process.removeListener('SIGINT', onInterrupt);
            }
        }
        case 'audit':
            return (await runAudit(config, args)).code;
        case 'render':
            return runRender(config, args);
    }
}

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(`❌ ${describeFailure(error)}`);
        process.exitCode = exitCodeFor(error);
    });
