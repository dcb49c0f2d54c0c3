import { getErrorMessage } from '../../shared/utils/errorMessage';
import { sleep as defaultSleep } from '../../shared/utils/retryLogic';
import type { BatchSummary, ThemeResult } from '../../shared/types';
import { appendToLedger, filterPending, loadLedger } from './ledger';
import { processTheme, type PipelineDeps } from './themePipeline';

export interface BatchOptions {
    ledgerPath: string;
    themeDelayMs: number;
    /** Ignore the ledger when choosing themes (completed themes are still recorded). */
    force?: boolean;
    /** Decides how many pending themes to run; undefined means all. */
    resolveLimit?: (pendingCount: number) => Promise<number | undefined>;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs themes one at a time. A theme that throws is logged and counted as
 * failed; the batch always continues. Completed themes go to the ledger.
 */
export async function runBatch(themes: string[], deps: PipelineDeps, options: BatchOptions): Promise<BatchSummary> {
    const wait = options.sleep ?? defaultSleep;
    const ledger = options.force ? new Set<string>() : await loadLedger(options.ledgerPath);
    const pending = filterPending(themes, ledger);
    const skipped = themes.length - pending.length;

    if (skipped > 0) {
        console.log(`[BATCH] Skipping ${skipped} already processed theme(s).`);
    }

    const limit = pending.length > 0 && options.resolveLimit
        ? await options.resolveLimit(pending.length)
        : undefined;
    const selected = limit === undefined ? pending : pending.slice(0, Math.max(0, limit));

    console.log(`[BATCH] ${selected.length} theme(s) to process.`);

    const results: ThemeResult[] = [];
    for (let i = 0; i < selected.length; i++) {
        const theme = selected[i];
        console.log(`[BATCH] (${i + 1}/${selected.length}) Processing '${theme}'`);

        let result: ThemeResult;
        try {
            result = await processTheme(theme, deps);
        } catch (error: unknown) {
            console.error(`[THEME:${theme}] Unexpected error; continuing with next theme:`, error);
            result = { theme, success: false, slideCount: 0, failedImages: 0, uploadedImages: 0, error: getErrorMessage(error) };
        }

        if (result.success) {
            try {
                await appendToLedger(options.ledgerPath, theme);
            } catch (error: unknown) {
                console.error(`[BATCH] Could not record '${theme}' in ledger ${options.ledgerPath}:`, error);
            }
            console.log(`[BATCH] '${theme}' completed.`);
        } else {
            console.warn(`[BATCH] '${theme}' not completed: ${result.error ?? 'unknown error'}`);
        }
        results.push(result);

        if (i < selected.length - 1 && options.themeDelayMs > 0) {
            await wait(options.themeDelayMs);
        }
    }

    const completed = results.filter(result => result.success).length;
    console.log(`[BATCH] Completed ${completed} of ${selected.length} theme(s).`);

    return {
        requested: themes.length,
        skipped,
        attempted: selected.length,
        completed,
        results
    };
}
