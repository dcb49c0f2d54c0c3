#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { parseArgs } from 'node:util';
import { ConfigError } from '../shared/errors';
import { CircuitBreaker } from '../shared/utils/retryLogic';
import { getErrorMessage } from '../shared/utils/errorMessage';
import type { BatchSummary } from '../shared/types';
import { loadConfig } from './config';
import { createAiClient } from './utils/geminiClient';
import { ask, askForAuthCode, askForLimit, parseLimit } from './utils/prompt';
import { createGeminiTextGenerator, generatePlaceholderText } from './services/slideGeneration';
import { createGeminiImageGenerator } from './services/imageGeneration';
import { renderPlaceholderImage } from './services/placeholderImage';
import { readThemeList } from './services/manifest';
import { createStorageTarget } from './services/storage';
import { runBatch } from './services/batchRunner';
import type { PipelineDeps } from './services/themePipeline';

const HELP = `Usage: slide-forge [options]

Generates themed slide decks (text, images, CSV manifest) with Gemini.

Options:
  --input <csv>    Batch mode: CSV with a "Theme" column
  --theme <text>   Single theme (prompted for when neither --input nor --theme is given)
  --limit <n>      Process at most n new themes (prompted for in batch mode when omitted)
  --offline        No model calls: placeholder text and placeholder images
  --force          Ignore the processed-themes ledger when selecting themes
  --env <path>     Environment file to load (default: config.env)
  -h, --help       Show this help
`;

export interface CliOptions {
    input?: string;
    theme?: string;
    limit?: number;
    offline: boolean;
    force: boolean;
    envPath: string;
    help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
    const { values } = parseArgs({
        args: argv,
        options: {
            input: { type: 'string' },
            theme: { type: 'string' },
            limit: { type: 'string' },
            offline: { type: 'boolean', default: false },
            force: { type: 'boolean', default: false },
            env: { type: 'string', default: 'config.env' },
            help: { type: 'boolean', short: 'h', default: false },
        },
        allowPositionals: false,
    });

    let limit: number | undefined;
    if (values.limit !== undefined) {
        const parsed = parseLimit(values.limit);
        if (parsed === null) {
            throw new ConfigError(`--limit must be a non-negative integer (got "${values.limit}")`);
        }
        limit = parsed;
    }

    return {
        input: values.input,
        theme: values.theme,
        limit,
        offline: values.offline ?? false,
        force: values.force ?? false,
        envPath: values.env ?? 'config.env',
        help: values.help ?? false,
    };
}

async function resolveThemes(options: CliOptions): Promise<string[]> {
    if (options.input) {
        const themes = await readThemeList(options.input);
        console.log(`[BATCH] Loaded ${themes.length} theme(s) from ${options.input}`);
        return themes;
    }

    const theme = (options.theme ?? await ask('Enter the theme for your slide series: ')).trim();
    if (!theme) {
        throw new ConfigError('Theme cannot be empty.');
    }
    return [theme];
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    let summary: BatchSummary;
    try {
        const options = parseCliArgs(argv);
        if (options.help) {
            console.log(HELP);
            return 0;
        }

        dotenv.config({ path: options.envPath });
        const config = loadConfig(process.env, { offline: options.offline });
        const themes = await resolveThemes(options);

        const ai = config.geminiApiKey ? createAiClient(config) : undefined;
        if (!ai) {
            console.log('[CONFIG] Offline mode: slide text and images will be placeholders.');
        }

        const deps: PipelineDeps = {
            config,
            generateText: ai
                ? createGeminiTextGenerator(ai, {
                    model: config.textModel,
                    temperature: config.temperature,
                    timeoutMs: config.textTimeoutMs,
                    breaker: new CircuitBreaker()
                })
                : generatePlaceholderText,
            images: {
                generateImage: ai
                    ? createGeminiImageGenerator(ai, { model: config.imageModel, breaker: new CircuitBreaker() })
                    : undefined,
                renderPlaceholder: renderPlaceholderImage
            },
            storage: await createStorageTarget(config, askForAuthCode)
        };

        const interactiveLimit = options.input !== undefined && options.limit === undefined && process.stdin.isTTY;
        summary = await runBatch(themes, deps, {
            ledgerPath: config.ledgerPath,
            themeDelayMs: config.themeDelayMs,
            force: options.force,
            resolveLimit: options.limit !== undefined
                ? async () => options.limit
                : interactiveLimit ? askForLimit : undefined
        });
    } catch (error: unknown) {
        if (error instanceof ConfigError) {
            console.error(`❌ ${error.message}`);
            return 1;
        }
        console.error(`❌ Run aborted: ${getErrorMessage(error)}`, error);
        return 1;
    }

    console.log(`🎉 Finished: ${summary.completed} of ${summary.attempted} theme(s) fully completed (${summary.skipped} skipped as already processed).`);
    return 0;
}

if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    }).catch(error => {
        console.error('Fatal error:', error);
        process.exitCode = 1;
    });
}
