import sharp from 'sharp';
import {
    PLACEHOLDER_BACKGROUND,
    PLACEHOLDER_HEIGHT,
    PLACEHOLDER_TEXT_COLOR,
    PLACEHOLDER_WIDTH,
} from '../../shared/constants';

export type PlaceholderRenderer = (displayText: string, outPath: string) => Promise<string>;

export interface PlaceholderLayout {
    width: number;
    height: number;
    fontSize: number;
    lineHeight: number;
    marginX: number;
}

export const DEFAULT_LAYOUT: PlaceholderLayout = {
    width: PLACEHOLDER_WIDTH,
    height: PLACEHOLDER_HEIGHT,
    fontSize: 64,
    lineHeight: 88,
    marginX: 96,
};

type TextStyle = 'bold' | 'italic' | 'plain';

interface StyledLine {
    text: string;
    style: TextStyle;
}

/**
 * Greedy word wrap. Words longer than `maxChars` are hard-split;
 * blank input lines are kept as empty lines.
 */
export function wrapText(text: string, maxChars: number): string[] {
    const lines: string[] = [];

    for (const paragraph of text.split(/\r?\n/)) {
        const words = paragraph.trim().split(/\s+/).filter(Boolean);
        if (words.length === 0) {
            lines.push('');
            continue;
        }

        let current = '';
        for (let word of words) {
            while (word.length > maxChars) {
                if (current) {
                    lines.push(current);
                    current = '';
                }
                lines.push(word.slice(0, maxChars));
                word = word.slice(maxChars);
            }
            if (!current) {
                current = word;
            } else if (current.length + 1 + word.length <= maxChars) {
                current = `${current} ${word}`;
            } else {
                lines.push(current);
                current = word;
            }
        }
        if (current) lines.push(current);
    }

    return lines;
}

// `**Title**` renders bold, `*Subtitle*` italic; the markers themselves are dropped.
function styleLine(line: string): StyledLine {
    const trimmed = line.trim();
    const bold = /^\*\*(.+)\*\*$/.exec(trimmed);
    if (bold) return { text: bold[1].trim(), style: 'bold' };
    const italic = /^[*_](.+)[*_]$/.exec(trimmed);
    if (italic) return { text: italic[1].trim(), style: 'italic' };
    return { text: trimmed.replace(/\*\*/g, ''), style: 'plain' };
}

function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/**
 * Flat background with the display text wrapped to the canvas width and
 * the whole block vertically centered.
 */
export function buildPlaceholderSvg(displayText: string, layout: PlaceholderLayout = DEFAULT_LAYOUT): string {
    // ~0.55em average glyph width for a sans-serif face
    const maxChars = Math.max(1, Math.floor((layout.width - 2 * layout.marginX) / (layout.fontSize * 0.55)));

    const lines: StyledLine[] = displayText
        .split(/\r?\n/)
        .map(styleLine)
        .flatMap(({ text, style }) => wrapText(text, maxChars).map(wrapped => ({ text: wrapped, style })));

    const blockHeight = lines.length * layout.lineHeight;
    const firstBaseline = (layout.height - blockHeight) / 2 + layout.fontSize;

    const tspans = lines.map((line, i) => {
        const y = Math.round(firstBaseline + i * layout.lineHeight);
        const weight = line.style === 'bold' ? ' font-weight="bold"' : '';
        const slant = line.style === 'italic' ? ' font-style="italic"' : '';
        return `<text x="${layout.width / 2}" y="${y}"${weight}${slant}>${escapeXml(line.text)}</text>`;
    });

    return [
        `<svg width="${layout.width}" height="${layout.height}" viewBox="0 0 ${layout.width} ${layout.height}" xmlns="http://www.w3.org/2000/svg">`,
        `<rect width="100%" height="100%" fill="${PLACEHOLDER_BACKGROUND}"/>`,
        `<g font-family="DejaVu Sans, Arial, sans-serif" font-size="${layout.fontSize}" fill="${PLACEHOLDER_TEXT_COLOR}" text-anchor="middle">`,
        ...tspans,
        `</g>`,
        `</svg>`,
    ].join('\n');
}

export const renderPlaceholderImage: PlaceholderRenderer = async (displayText, outPath) => {
    const svg = buildPlaceholderSvg(displayText);
    await sharp(Buffer.from(svg, 'utf8'))
        .resize(PLACEHOLDER_WIDTH, PLACEHOLDER_HEIGHT)
        .png()
        .toFile(outPath);
    return outPath;
};
