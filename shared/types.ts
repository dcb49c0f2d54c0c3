/**
 * Which content template a theme uses. Chosen by keyword in the theme string.
 */
export type TemplateKind = 'month' | 'class' | 'generic';

/**
 * Content template: fixes the expected slide count used to prompt the
 * generator and to bound parsing.
 */
export interface SlideTemplate {
    kind: TemplateKind;
    expectedSlides: number;
    itemLabel: 'Month' | 'Class' | 'Concept';
    guideline: string;
    /** Labels used when a generated slide header carries none (index = ordinal - 1). */
    fallbackLabels: readonly string[];
}

/**
 * One parsed slide. `displayText` is the exact text to render onto the image
 * and is never empty.
 */
export interface SlideRecord {
    readonly ordinal: number;
    readonly label: string;
    readonly visual: string;
    readonly displayText: string;
}

export interface ParseResult {
    slides: SlideRecord[];
    warnings: string[];
}

export type ImageOutcome =
    | { status: 'generated'; path: string }
    | { status: 'placeholder'; path: string }
    | { status: 'failed'; reason: string };

export type ImageVariantCount = 1 | 2;

export interface GeneratedImageData {
    base64Data: string;
    mimeType: string;
}

/**
 * Flattened manifest row. Image columns hold a path or the failure sentinel;
 * `imageV2` is empty when a single variant is configured.
 */
export interface ManifestRow {
    theme: string;
    ordinal: number;
    label: string;
    visual: string;
    displayText: string;
    imageV1: string;
    imageV2: string;
}

export interface ThemeResult {
    theme: string;
    success: boolean;
    slideCount: number;
    manifestPath?: string;
    failedImages: number;
    uploadedImages: number;
    error?: string;
}

export interface BatchSummary {
    requested: number;
    skipped: number;
    attempted: number;
    completed: number;
    results: ThemeResult[];
}
