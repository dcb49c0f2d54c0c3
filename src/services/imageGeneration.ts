import { Modality } from '@google/genai';
import { IMAGE_ASPECT_RATIO } from '../../shared/constants';
import { retryWithBackoff, type CircuitBreaker } from '../../shared/utils/retryLogic';
import { getErrorMessage } from '../../shared/utils/errorMessage';
import { GeminiError, ImageGenError } from '../../shared/errors';
import type { GeneratedImageData } from '../../shared/types';
import type { GenerateContentClient } from './slideGeneration';

export type SlideImageGenerator = (imagePrompt: string) => Promise<GeneratedImageData>;

export interface ImageGenerationSettings {
    model: string;
    temperature?: number;
    /** Retries after the first attempt (default 2). */
    retries?: number;
    breaker?: CircuitBreaker;
}

const NETWORK_FAILURE = /network|econnreset|econnrefused|etimedout|enotfound|socket hang up|fetch failed/;

/**
 * Callers only see `ImageGenError`: deadline overruns become TIMEOUT, the
 * rest (open circuit, exhausted retries, API errors) UNKNOWN with the cause kept.
 */
export function toImageGenError(error: unknown): ImageGenError {
    if (error instanceof ImageGenError) return error;
    if (error instanceof GeminiError && error.code === 'TIMEOUT') {
        return new ImageGenError(error.message, 'TIMEOUT', false, error);
    }
    return new ImageGenError(getErrorMessage(error), 'UNKNOWN', false, error);
}

export function createGeminiImageGenerator(client: GenerateContentClient, settings: ImageGenerationSettings): SlideImageGenerator {
    return async (imagePrompt) => {
        const generateFn = async (): Promise<GeneratedImageData> => {
            try {
                const response = await client.models.generateContent({
                    model: settings.model,
                    contents: [{ role: 'user', parts: [{ text: imagePrompt }] }],
                    config: {
                        responseModalities: [Modality.IMAGE],
                        temperature: settings.temperature ?? 0.7,
                        imageConfig: {
                            aspectRatio: IMAGE_ASPECT_RATIO,
                            imageSize: '1K'
                        }
                    }
                });

                if (response.promptFeedback?.blockReason) {
                    throw new ImageGenError(`Image generation blocked: ${response.promptFeedback.blockReason}`, 'SAFETY_BLOCKED', false);
                }

                // Extract image from response parts
                const parts = response.candidates?.[0]?.content?.parts;
                const inlineData = parts?.find(p => p.inlineData?.data)?.inlineData;

                if (!inlineData?.data) {
                    throw new ImageGenError("No image data returned", 'NO_IMAGE_DATA', true);
                }

                return {
                    base64Data: inlineData.data,
                    mimeType: inlineData.mimeType ?? "image/png"
                };
            } catch (error: unknown) {
                if (error instanceof ImageGenError) throw error;
                const message = getErrorMessage(error).toLowerCase();
                if (message.includes('safety')) {
                    throw new ImageGenError("Image generation blocked by safety filters", 'SAFETY_BLOCKED', false, error);
                }
                if (NETWORK_FAILURE.test(message)) {
                    throw new ImageGenError(`Network error during image generation: ${getErrorMessage(error)}`, 'NETWORK', true, error);
                }
                throw error;
            }
        };

        try {
            return await retryWithBackoff(generateFn, { retries: settings.retries ?? 2, breaker: settings.breaker, label: 'image generation' });
        } catch (error: unknown) {
            throw toImageGenError(error);
        }
    };
}
