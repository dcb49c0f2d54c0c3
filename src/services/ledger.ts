import { promises as fs } from 'node:fs';
import path from 'node:path';

function normalizeTheme(theme: string): string {
    return theme.replace(/[\r\n]+/g, ' ').trim();
}

function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Completed themes, one per line. A missing ledger is an empty one.
 */
export async function loadLedger(ledgerPath: string): Promise<Set<string>> {
    let content: string;
    try {
        content = await fs.readFile(ledgerPath, 'utf8');
    } catch (error: unknown) {
        if (isMissingFile(error)) return new Set();
        throw error;
    }

    return new Set(
        content
            .split(/\r?\n/)
            .map(line => line.trim())
            .filter(Boolean)
    );
}

export async function appendToLedger(ledgerPath: string, theme: string): Promise<void> {
    const dir = path.dirname(ledgerPath);
    if (dir && dir !== '.') {
        await fs.mkdir(dir, { recursive: true });
    }
    await fs.appendFile(ledgerPath, `${normalizeTheme(theme)}\n`, 'utf8');
}

export function filterPending(themes: string[], ledger: ReadonlySet<string>): string[] {
    return themes.filter(theme => !ledger.has(normalizeTheme(theme)));
}
