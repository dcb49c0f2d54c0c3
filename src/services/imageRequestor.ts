import { promises as fs } from 'node:fs';
import path from 'node:path';
import sharp from 'sharp';
import { buildSlideImagePrompt } from '../../shared/promptBuilders';
import { variantFileName } from '../../shared/utils/filenames';
import { getErrorMessage } from '../../shared/utils/errorMessage';
import { ImageGenError } from '../../shared/errors';
import type { ImageOutcome, ImageVariantCount } from '../../shared/types';
import type { SlideImageGenerator } from './imageGeneration';
import type { PlaceholderRenderer } from './placeholderImage';

export interface SlideImageRequest {
    theme: string;
    visual: string;
    displayText: string;
    /** e.g. `01_January`; variants are written as `<baseName>_v<n>.png`. */
    baseName: string;
    imageDir: string;
    variants: ImageVariantCount;
}

export interface ImageRequestorDeps {
    /** Undefined when running without credentials: every variant becomes a placeholder. */
    generateImage?: SlideImageGenerator;
    renderPlaceholder: PlaceholderRenderer;
}

async function generateVariant(
    generateImage: SlideImageGenerator,
    imagePrompt: string,
    outPath: string
): Promise<string> {
    const image = await generateImage(imagePrompt);
    const bytes = Buffer.from(image.base64Data, 'base64');
    if (bytes.length === 0) {
        throw new ImageGenError("Image payload decoded to zero bytes", 'NO_IMAGE_DATA', false);
    }
    if (image.mimeType === 'image/png') {
        await fs.writeFile(outPath, bytes);
    } else {
        // Files and uploads are always PNG
        await sharp(bytes).png().toFile(outPath);
    }
    return outPath;
}

async function placeholderVariant(
    renderPlaceholder: PlaceholderRenderer,
    displayText: string,
    outPath: string
): Promise<ImageOutcome> {
    try {
        const written = await renderPlaceholder(displayText, outPath);
        console.log(`[IMAGE_GEN] Created placeholder image: ${written}`);
        return { status: 'placeholder', path: written };
    } catch (error: unknown) {
        console.error(`[IMAGE_GEN] Failed to create placeholder image ${outPath}:`, error);
        return { status: 'failed', reason: getErrorMessage(error) };
    }
}

/**
 * Produces exactly `request.variants` outcomes. Each variant is attempted
 * independently: service image, else placeholder, else a failed outcome.
 * Never throws.
 */
export async function requestSlideImages(request: SlideImageRequest, deps: ImageRequestorDeps): Promise<ImageOutcome[]> {
    const imagePrompt = buildSlideImagePrompt(request.theme, request.visual, request.displayText);
    const outcomes: ImageOutcome[] = [];

    try {
        await fs.mkdir(request.imageDir, { recursive: true });
    } catch (error: unknown) {
        console.error(`[IMAGE_GEN] Could not create image directory ${request.imageDir}:`, error);
    }

    for (let variant = 1; variant <= request.variants; variant++) {
        const outPath = path.join(request.imageDir, variantFileName(request.baseName, variant));

        if (!deps.generateImage) {
            console.log(`[IMAGE_GEN] No image service configured; using placeholder for ${path.basename(outPath)}`);
            outcomes.push(await placeholderVariant(deps.renderPlaceholder, request.displayText, outPath));
            continue;
        }

        try {
            console.log(`[IMAGE_GEN] Requesting image ${path.basename(outPath)}...`);
            const written = await generateVariant(deps.generateImage, imagePrompt, outPath);
            console.log(`[IMAGE_GEN] Saved image: ${written}`);
            outcomes.push({ status: 'generated', path: written });
        } catch (error: unknown) {
            console.warn(`[IMAGE_GEN] Image generation failed for ${path.basename(outPath)} (visual: "${request.visual}"): ${getErrorMessage(error)}. Using placeholder.`);
            outcomes.push(await placeholderVariant(deps.renderPlaceholder, request.displayText, outPath));
        }
    }

    return outcomes;
}
