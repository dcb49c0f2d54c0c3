import {
    DEFAULT_IMAGE_VARIANTS,
    DEFAULT_TEMPERATURE,
    DEFAULT_TEXT_TIMEOUT_MS,
    DEFAULT_THEME_DELAY_MS,
    MODEL_IMAGE_GENERATION,
    MODEL_SLIDE_GENERATION,
} from '../shared/constants';
import { ConfigError } from '../shared/errors';
import type { ImageVariantCount } from '../shared/types';

export type UploadConfig =
    | { provider: 'none' }
    | { provider: 'drive'; parentFolderId: string; credentialsPath: string; tokenPath: string }
    | { provider: 'firebase'; bucket: string; parentPrefix: string };

/**
 * Built once at startup and passed to every component.
 */
export interface AppConfig {
    geminiApiKey?: string;
    textModel: string;
    imageModel: string;
    temperature: number;
    textTimeoutMs: number;
    imageVariants: ImageVariantCount;
    outputDir: string;
    ledgerPath: string;
    themeDelayMs: number;
    debugRawText: boolean;
    upload: UploadConfig;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function readNumber(env: Env, key: string, fallback: number, check: (n: number) => boolean, rule: string): number {
    const raw = readString(env, key);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || !check(value)) {
        throw new ConfigError(`${key} must be ${rule} (got "${raw}")`, key);
    }
    return value;
}

function readFlag(env: Env, key: string): boolean {
    const raw = readString(env, key)?.toLowerCase();
    return raw === '1' || raw === 'true' || raw === 'yes';
}

function readUploadConfig(env: Env): UploadConfig {
    const provider = (readString(env, 'UPLOAD_PROVIDER') ?? 'none').toLowerCase();

    switch (provider) {
        case 'none':
            return { provider: 'none' };
        case 'drive': {
            const parentFolderId = readString(env, 'DRIVE_PARENT_FOLDER_ID');
            if (!parentFolderId) {
                throw new ConfigError('DRIVE_PARENT_FOLDER_ID is required when UPLOAD_PROVIDER=drive', 'DRIVE_PARENT_FOLDER_ID');
            }
            return {
                provider: 'drive',
                parentFolderId,
                credentialsPath: readString(env, 'DRIVE_CREDENTIALS_PATH') ?? 'credentials.json',
                tokenPath: readString(env, 'DRIVE_TOKEN_PATH') ?? 'token.json',
            };
        }
        case 'firebase': {
            const bucket = readString(env, 'FIREBASE_STORAGE_BUCKET');
            if (!bucket) {
                throw new ConfigError('FIREBASE_STORAGE_BUCKET is required when UPLOAD_PROVIDER=firebase', 'FIREBASE_STORAGE_BUCKET');
            }
            return {
                provider: 'firebase',
                bucket,
                parentPrefix: (readString(env, 'FIREBASE_PARENT_PREFIX') ?? 'slides').replace(/^\/+|\/+$/g, ''),
            };
        }
        default:
            throw new ConfigError(`UPLOAD_PROVIDER must be one of none, drive, firebase (got "${provider}")`, 'UPLOAD_PROVIDER');
    }
}

/**
 * Reads configuration from an env map (usually `process.env` after dotenv has
 * loaded `config.env`). Without `offline`, a missing GEMINI_API_KEY is fatal.
 */
export function loadConfig(env: Env, options: { offline?: boolean } = {}): AppConfig {
    const geminiApiKey = readString(env, 'GEMINI_API_KEY');
    if (!geminiApiKey && !options.offline) {
        throw new ConfigError('GEMINI_API_KEY is not set. Add it to config.env or run with --offline.', 'GEMINI_API_KEY');
    }

    const imageVariants = readNumber(env, 'IMAGE_VARIANTS', DEFAULT_IMAGE_VARIANTS, n => n === 1 || n === 2, '1 or 2');

    return {
        geminiApiKey: options.offline ? undefined : geminiApiKey,
        textModel: readString(env, 'TEXT_MODEL') ?? MODEL_SLIDE_GENERATION,
        imageModel: readString(env, 'IMAGE_MODEL') ?? MODEL_IMAGE_GENERATION,
        temperature: readNumber(env, 'TEXT_TEMPERATURE', DEFAULT_TEMPERATURE, n => n >= 0 && n <= 2, 'a number between 0 and 2'),
        textTimeoutMs: readNumber(env, 'TEXT_TIMEOUT_MS', DEFAULT_TEXT_TIMEOUT_MS, n => n > 0, 'a positive number'),
        imageVariants: imageVariants === 1 ? 1 : 2,
        outputDir: readString(env, 'OUTPUT_DIR') ?? 'output',
        ledgerPath: readString(env, 'LEDGER_PATH') ?? 'processed_themes.txt',
        themeDelayMs: readNumber(env, 'THEME_DELAY_MS', DEFAULT_THEME_DELAY_MS, n => n >= 0, 'a non-negative number'),
        debugRawText: readFlag(env, 'DEBUG_RAW_TEXT'),
        upload: readUploadConfig(env),
    };
}
