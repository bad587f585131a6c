import {
    AnalysisDiagnostics,
    CandidateRole,
    InteractionOutcome,
    NavigationElement,
    PageAnalysis,
    PageMetadata,
    RevealedOutcome,
    RunStatistics
} from '../../types/index.js';
import { textKey } from '../../shared/utils/text.js';

export interface AssembleExtras {
    navigationElements?: NavigationElement[];
    metadata?: Partial<PageMetadata> & Partial<RunStatistics>;
}

/** De-duplication key: normalized lower-case trigger text and role. */
export function outcomeKey(outcome: InteractionOutcome, role: CandidateRole): string {
    // Textless triggers (icon buttons) fall back to their locator so they do not all collapse into one
    const text = textKey(outcome.trigger.text) || outcome.trigger.locator;
    return `${role}::${text}`;
}

/** Revealed outcomes only, first occurrence of each key, order kept */
export function dedupe(outcomes: readonly InteractionOutcome[], role: CandidateRole): RevealedOutcome[] {
    const seen = new Set<string>();
    const kept: RevealedOutcome[] = [];
    for (const outcome of outcomes) {
        if (outcome.kind !== 'revealed') continue;
        const key = outcomeKey(outcome, role);
        if (seen.has(key)) continue;
        seen.add(key);
        kept.push(outcome);
    }
    return kept;
}

function diagnose(outcomes: readonly InteractionOutcome[]): AnalysisDiagnostics {
    const diagnostics: AnalysisDiagnostics = { noChangeCount: 0, failedCount: 0, failures: [] };
    for (const outcome of outcomes) {
        if (outcome.kind === 'no-change') {
            diagnostics.noChangeCount++;
        } else if (outcome.kind === 'failed') {
            diagnostics.failedCount++;
            diagnostics.failures.push({
                action: outcome.action,
                trigger: outcome.trigger.locator,
                code: outcome.code,
                reason: outcome.reason
            });
        }
    }
    return diagnostics;
}

/**
 * Build the run's PageAnalysis. Only revealed outcomes reach the public lists;
 * the rest are counted in `diagnostics`. Pure: inputs are not modified and the
 * same inputs always give the same record.
 */
export function assemble(
    url: string,
    title: string,
    hoverOutcomes: readonly InteractionOutcome[],
    popupOutcomes: readonly InteractionOutcome[],
    extras: AssembleExtras = {}
): PageAnalysis {
    return {
        url,
        title,
        hoverInteractions: dedupe(hoverOutcomes, 'hoverable'),
        popupInteractions: dedupe(popupOutcomes, 'popup-trigger'),
        navigationElements: [...(extras.navigationElements ?? [])],
        metadata: { ...extras.metadata },
        diagnostics: diagnose([...hoverOutcomes, ...popupOutcomes])
    };
}
