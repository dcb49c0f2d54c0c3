import type { GenerateContentParameters, GenerateContentResponse } from '@google/genai';
import { buildSlideDeckSystemPrompt, buildSlideDeckUserPrompt } from '../../shared/promptBuilders';
import { retryWithBackoff, type CircuitBreaker } from '../../shared/utils/retryLogic';
import { parseSlideBlock } from '../../shared/utils/slideParser';
import { CHARACTER_CLASSES, MONTH_NAMES, SLIDE_DELIMITER } from '../../shared/constants';
import { GeminiError } from '../../shared/errors';
import type { SlideRecord, SlideTemplate } from '../../shared/types';

export interface SlidePrompt {
    theme: string;
    template: SlideTemplate;
    system: string;
    user: string;
}

export type SlideTextGenerator = (prompt: SlidePrompt) => Promise<string>;

/** The slice of the SDK client the generators call. */
export interface GenerateContentClient {
    models: {
        generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
    };
}

export interface TextGenerationSettings {
    model: string;
    temperature: number;
    timeoutMs: number;
    breaker?: CircuitBreaker;
}

export function createGeminiTextGenerator(client: GenerateContentClient, settings: TextGenerationSettings): SlideTextGenerator {
    return async (prompt) => {
        const generateFn = async () => {
            const result = await client.models.generateContent({
                model: settings.model,
                contents: [{ role: 'user', parts: [{ text: prompt.user }] }],
                config: {
                    temperature: settings.temperature,
                    systemInstruction: { parts: [{ text: prompt.system }] }
                }
            });

            const parts = result.candidates?.[0]?.content?.parts ?? [];
            const text = parts
                .map(part => part.text ?? '')
                .join('')
                .trim();

            if (!text) {
                throw new GeminiError("Empty response from AI model", 'API_ERROR', true);
            }

            console.log(`[TEXT_GEN] Received ${text.length} chars (tokens in/out: ${result.usageMetadata?.promptTokenCount ?? 0}/${result.usageMetadata?.candidatesTokenCount ?? 0})`);
            return text;
        };

        return retryWithBackoff(generateFn, {
            timeoutMs: settings.timeoutMs,
            breaker: settings.breaker,
            label: 'slide text generation'
        });
    };
}

function placeholderLabels(template: SlideTemplate): string[] {
    switch (template.kind) {
        case 'month':
            return [...MONTH_NAMES];
        case 'class':
            return [...CHARACTER_CLASSES];
        case 'generic':
            return Array.from({ length: template.expectedSlides - 1 }, (_, i) => `Concept ${i + 1}`);
    }
}

/**
 * Deck in the generator's output format, used when running offline.
 */
export function buildPlaceholderDeck(theme: string, template: SlideTemplate): string {
    const chunks = [
        `### **Slide 1 – Title Card**
**visual:** Placeholder visual for the title card of "${theme}"
**The slide should have this exact text (don't add any other text):**
**${theme}**
*Placeholder subtitle*`
    ];

    placeholderLabels(template).forEach((label, i) => {
        chunks.push(`### **Slide ${i + 2} – ${label}**
**visual:** Placeholder visual for ${label}
**The slide should have this exact text (don't add any other text):**
**${label} – Placeholder Item**
*Placeholder detail*`);
    });

    return chunks.join(`\n\n${SLIDE_DELIMITER}\n\n`) + '\n';
}

/**
 * Text source for offline runs: ignores the prompts and returns the placeholder deck.
 */
export const generatePlaceholderText: SlideTextGenerator = async ({ theme, template }) => {
    console.log(`[TEXT_GEN] Offline: using placeholder slide text for '${theme}'.`);
    return buildPlaceholderDeck(theme, template);
};

export interface GeneratedSlides {
    raw: string;
    slides: SlideRecord[];
    warnings: string[];
}

/**
 * Requests the slide text for a theme and parses it. Generation errors
 * propagate; parsing never throws.
 */
export async function generateSlides(
    theme: string,
    template: SlideTemplate,
    generateText: SlideTextGenerator
): Promise<GeneratedSlides> {
    const raw = await generateText({
        theme,
        template,
        system: buildSlideDeckSystemPrompt(),
        user: buildSlideDeckUserPrompt(theme, template)
    });

    const { slides, warnings } = parseSlideBlock(raw, template.expectedSlides, {
        fallbackLabels: template.fallbackLabels
    });

    if (slides.length !== template.expectedSlides) {
        warnings.push(`Expected ${template.expectedSlides} slides, but parsed ${slides.length}. Check generated text format.`);
    }

    return { raw, slides, warnings };
}
