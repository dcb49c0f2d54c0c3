import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { FAILURE_SENTINEL, INPUT_THEME_COLUMN } from '../../shared/constants';
import { ConfigError } from '../../shared/errors';
import { validateManifestRecord } from '../../shared/utils/validation';
import type { ImageOutcome, ManifestRow, SlideRecord } from '../../shared/types';

export const MANIFEST_COLUMNS = ['theme', 'slide_number', 'label', 'visual', 'slide_text', 'image_v1', 'image_v2'] as const;

function outcomeCell(outcome: ImageOutcome | undefined): string {
    if (!outcome) return '';
    return outcome.status === 'failed' ? FAILURE_SENTINEL : outcome.path;
}

export function toManifestRow(theme: string, slide: SlideRecord, outcomes: ImageOutcome[]): ManifestRow {
    return {
        theme,
        ordinal: slide.ordinal,
        label: slide.label,
        visual: slide.visual,
        displayText: slide.displayText,
        imageV1: outcomeCell(outcomes[0]),
        imageV2: outcomeCell(outcomes[1]),
    };
}

export function serializeManifest(rows: ManifestRow[]): string {
    return stringify([
        [...MANIFEST_COLUMNS],
        ...rows.map(row => [
            row.theme,
            String(row.ordinal),
            row.label,
            row.visual,
            row.displayText,
            row.imageV1,
            row.imageV2,
        ]),
    ]);
}

/**
 * Writes the whole manifest at once; an existing file is replaced.
 */
export async function writeManifest(filePath: string, rows: ManifestRow[]): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, serializeManifest(rows), 'utf8');
    return filePath;
}

function toStringRecord(value: unknown): Record<string, string> {
    const record: Record<string, string> = {};
    if (typeof value !== 'object' || value === null) return record;
    for (const [key, cell] of Object.entries(value)) {
        if (typeof cell === 'string') record[key] = cell;
    }
    return record;
}

export function parseManifest(content: string): ManifestRow[] {
    const parsed: unknown = parse(content, { columns: true, skip_empty_lines: true });
    const records: unknown[] = Array.isArray(parsed) ? parsed : [];

    return records.map((value, idx) => {
        const errors = validateManifestRecord(value, idx);
        if (errors.length > 0) {
            throw new Error(`Invalid manifest: ${errors.join('; ')}`);
        }
        const record = toStringRecord(value);
        return {
            theme: record.theme,
            ordinal: Number(record.slide_number),
            label: record.label,
            visual: record.visual,
            displayText: record.slide_text,
            imageV1: record.image_v1,
            imageV2: record.image_v2,
        };
    });
}

export async function readManifest(filePath: string): Promise<ManifestRow[]> {
    return parseManifest(await fs.readFile(filePath, 'utf8'));
}

/**
 * Theme list from an input CSV with a `Theme` column. Blank entries are
 * skipped and duplicates collapsed, keeping first-seen order.
 */
export function parseThemeList(content: string, source = 'input manifest'): string[] {
    const parsed: unknown = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true });
    const rows: unknown[] = Array.isArray(parsed) ? parsed : [];
    const header: unknown[] = Array.isArray(rows[0]) ? rows[0] : [];
    const column = header.findIndex(cell => typeof cell === 'string' && cell.trim() === INPUT_THEME_COLUMN);

    if (column === -1) {
        throw new ConfigError(`${source} has no '${INPUT_THEME_COLUMN}' column`);
    }

    const themes = new Set<string>();
    for (const row of rows.slice(1)) {
        const cell: unknown = Array.isArray(row) ? row[column] : undefined;
        const theme = typeof cell === 'string' ? cell.trim() : '';
        if (theme) themes.add(theme);
    }
    return [...themes];
}

export async function readThemeList(filePath: string): Promise<string[]> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf8');
    } catch {
        throw new ConfigError(`Input manifest not found or unreadable: ${filePath}`);
    }
    return parseThemeList(content, filePath);
}
