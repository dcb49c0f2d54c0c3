import type { ParseResult, SlideRecord } from '../types';

export interface ParseOptions {
    /** Labels used when a chunk header carries none, indexed by ordinal - 1. */
    fallbackLabels?: readonly string[];
}

// A line holding only the delimiter (three or more dashes).
const DELIMITER_LINE = /^[ \t]*-{3,}[ \t]*$/m;

// `**visual:** ...`, `visual: ...`, `_Visual_: ...`, `- **visual:** ...`, `🎨 **visual:** ...`
// The match starts at the beginning of the marker's line.
const VISUAL_LINE = /^[^\n]*?(?<![\p{L}\p{N}])[*_]*visual[*_]*[^\S\n]*:[*_]*[^\S\n]*(.*)$/imu;

// `**The slide should have this exact text (don't add any other text):**`
const INSTRUCTION_LINE = /^[*_\s]*the slide should have this exact text[^\n]*(?:\n|$)/i;

// `### 🏷️ **Slide 1 – Title Card**`, `Slide 2 – **January**`, `Slide 3 - Bard`
const HEADER_LABEL = /slide[^\S\n]*#?[^\S\n]*\d+[^\S\n]*[–—-]+[^\S\n]*(.+)$/im;

export function splitChunks(raw: string): string[] {
    return raw
        .split(DELIMITER_LINE)
        .map(chunk => chunk.trim())
        .filter(chunk => chunk.length > 0);
}

function extractLabel(header: string): string | null {
    const match = HEADER_LABEL.exec(header);
    if (!match) return null;
    const label = match[1].replace(/[*_#`]/g, '').trim();
    return label || null;
}

/**
 * Splits one generated markdown block into slide records.
 *
 * Chunks without a visual marker, or with no text left after the visual line,
 * are dropped with a warning and do not consume an ordinal: survivors are
 * numbered 1..n in encounter order. Output is capped at `expectedCount`.
 * Never throws.
 */
export function parseSlideBlock(raw: string, expectedCount: number, options: ParseOptions = {}): ParseResult {
    const chunks = splitChunks(raw);
    const slides: SlideRecord[] = [];
    const warnings: string[] = [];

    for (let i = 0; i < chunks.length; i++) {
        if (slides.length >= expectedCount) {
            warnings.push(`Found ${chunks.length - i} chunk(s) beyond the expected ${expectedCount} slides; discarding them.`);
            break;
        }

        const chunk = chunks[i];
        const visualMatch = VISUAL_LINE.exec(chunk);
        if (!visualMatch) {
            warnings.push(`Chunk ${i + 1}: no 'visual:' marker found. Skipping.`);
            continue;
        }

        const visual = visualMatch[1].trim();
        const afterVisual = chunk.slice(visualMatch.index + visualMatch[0].length).trim();
        const displayText = afterVisual.replace(INSTRUCTION_LINE, '').trim();

        if (!displayText) {
            warnings.push(`Chunk ${i + 1}: no slide text after the visual line. Skipping.`);
            continue;
        }

        const ordinal = slides.length + 1;
        const header = chunk.slice(0, visualMatch.index);
        const label = extractLabel(header)
            ?? options.fallbackLabels?.[ordinal - 1]
            ?? `Slide_${ordinal}`;

        slides.push({ ordinal, label, visual, displayText });
    }

    return { slides, warnings };
}
