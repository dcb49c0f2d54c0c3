import { createHash } from 'crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { MANIFEST_FILENAME, RAW_TEXT_FILENAME } from '../../shared/constants';
import { classifyTheme } from '../../shared/utils/themeClassifier';
import { sanitizeForFilename, slideBaseName } from '../../shared/utils/filenames';
import { getErrorMessage } from '../../shared/utils/errorMessage';
import type { ImageOutcome, ManifestRow, ThemeResult } from '../../shared/types';
import type { AppConfig } from '../config';
import { generateSlides, type GeneratedSlides, type SlideTextGenerator } from './slideGeneration';
import { requestSlideImages, type ImageRequestorDeps } from './imageRequestor';
import { toManifestRow, writeManifest } from './manifest';
import type { StorageTarget } from './storage';

export interface PipelineDeps {
    config: Pick<AppConfig, 'outputDir' | 'imageVariants' | 'debugRawText'>;
    generateText: SlideTextGenerator;
    images: ImageRequestorDeps;
    storage?: StorageTarget;
}

/**
 * `<outputDir>/<sanitized theme>`. When sanitizing loses information (stripped
 * characters, underscores, repeated or non-space whitespace, truncation) an
 * 8-char hash of the theme is appended, so `A/B` and `AB` get different directories.
 */
export function themeOutputDir(outputDir: string, theme: string): string {
    const segment = sanitizeForFilename(theme, 'theme');
    const lossless = !theme.includes('_') && segment === theme.replace(/ /g, '_');
    const suffix = lossless ? '' : `_${createHash('sha1').update(theme).digest('hex').slice(0, 8)}`;
    return path.join(outputDir, segment + suffix);
}

/**
 * Best-effort: failures are logged and only reduce the returned count.
 */
export async function uploadImages(storage: StorageTarget, theme: string, outcomes: ImageOutcome[]): Promise<number> {
    const paths = outcomes.flatMap(outcome => outcome.status === 'failed' ? [] : [outcome.path]);
    if (paths.length === 0) return 0;

    let folderId: string;
    try {
        folderId = await storage.ensureFolder(theme);
    } catch (error: unknown) {
        console.error(`[STORAGE] Could not resolve ${storage.name} folder for '${theme}'; skipping uploads:`, error);
        return 0;
    }

    let uploaded = 0;
    for (const localPath of paths) {
        try {
            const remoteId = await storage.upload(folderId, localPath);
            console.log(`[STORAGE] Uploaded ${path.basename(localPath)} (${remoteId})`);
            uploaded++;
        } catch (error: unknown) {
            console.error(`[STORAGE] Upload failed for ${localPath}:`, error);
        }
    }
    return uploaded;
}

/**
 * Text -> slides -> images -> manifest -> uploads for one theme.
 * Success requires generated text, at least one slide, a written manifest
 * and no failed image. Expected failures are reported in the result.
 */
export async function processTheme(theme: string, deps: PipelineDeps): Promise<ThemeResult> {
    const tag = `[THEME:${theme}]`;
    const template = classifyTheme(theme);
    console.log(`${tag} Using ${template.kind} template (${template.expectedSlides} slides).`);

    const failure = (error: string): ThemeResult => ({
        theme, success: false, slideCount: 0, failedImages: 0, uploadedImages: 0, error
    });

    let generated: GeneratedSlides;
    try {
        generated = await generateSlides(theme, template, deps.generateText);
    } catch (error: unknown) {
        console.error(`${tag} Text generation failed:`, error);
        return failure(`Text generation failed: ${getErrorMessage(error)}`);
    }

    generated.warnings.forEach(warning => console.warn(`[PARSER] ${warning}`));
    if (generated.slides.length === 0) {
        console.error(`${tag} No slides could be parsed from the generated text.`);
        return failure('No slides parsed');
    }
    console.log(`${tag} Parsed ${generated.slides.length} slides.`);

    const themeDir = themeOutputDir(deps.config.outputDir, theme);
    const imageDir = path.join(themeDir, 'images');

    if (deps.config.debugRawText) {
        console.log(`${tag} Raw generated text:\n${generated.raw}`);
    }
    try {
        await fs.mkdir(themeDir, { recursive: true });
        await fs.writeFile(path.join(themeDir, RAW_TEXT_FILENAME), generated.raw, 'utf8');
    } catch (error: unknown) {
        console.warn(`${tag} Could not save raw text: ${getErrorMessage(error)}`);
    }

    const rows: ManifestRow[] = [];
    const allOutcomes: ImageOutcome[] = [];
    for (const slide of generated.slides) {
        const outcomes = await requestSlideImages({
            theme,
            visual: slide.visual,
            displayText: slide.displayText,
            baseName: slideBaseName(slide.ordinal, slide.label),
            imageDir,
            variants: deps.config.imageVariants
        }, deps.images);

        rows.push(toManifestRow(theme, slide, outcomes));
        allOutcomes.push(...outcomes);
    }

    const failedImages = allOutcomes.filter(outcome => outcome.status === 'failed').length;
    const manifestPath = path.join(themeDir, MANIFEST_FILENAME);

    let manifestWritten = false;
    try {
        await writeManifest(manifestPath, rows);
        manifestWritten = true;
        console.log(`${tag} Wrote ${rows.length} rows to ${manifestPath}`);
    } catch (error: unknown) {
        console.error(`${tag} Failed to write manifest ${manifestPath}:`, error);
    }

    const uploadedImages = deps.storage ? await uploadImages(deps.storage, theme, allOutcomes) : 0;

    const result: ThemeResult = {
        theme,
        success: manifestWritten && failedImages === 0,
        slideCount: generated.slides.length,
        manifestPath: manifestWritten ? manifestPath : undefined,
        failedImages,
        uploadedImages
    };

    if (!manifestWritten) {
        result.error = 'Manifest write failed';
    } else if (failedImages > 0) {
        result.error = `${failedImages} image(s) failed`;
    }
    return result;
}
