import * as readline from 'node:readline/promises';

export async function ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question(question);
    } finally {
        rl.close();
    }
}

/**
 * Blank means no cap (undefined); a non-negative integer is the cap;
 * anything else is null.
 */
export function parseLimit(answer: string): number | undefined | null {
    const trimmed = answer.trim();
    if (!trimmed) return undefined;
    if (!/^\d+$/.test(trimmed)) return null;
    return Number(trimmed);
}

export async function askForLimit(pendingCount: number): Promise<number | undefined> {
    for (; ;) {
        const limit = parseLimit(await ask(`How many of the ${pendingCount} new theme(s) should be processed? (Enter for all): `));
        if (limit !== null) return limit;
        console.log('Please enter a whole number, or press Enter for all.');
    }
}

export async function askForAuthCode(authUrl: string): Promise<string> {
    console.log(`Authorize Drive access by visiting this URL:\n${authUrl}`);
    return ask('Enter the code from that page here: ');
}
