import { GoogleGenAI } from "@google/genai";
import { ConfigError } from '../../shared/errors';
import type { AppConfig } from '../config';

export const createAiClient = (config: Pick<AppConfig, 'geminiApiKey'>): GoogleGenAI => {
    const key = config.geminiApiKey;

    if (!key) {
        throw new ConfigError("GEMINI_API_KEY not configured", 'GEMINI_API_KEY');
    }

    return new GoogleGenAI({ apiKey: key });
};
