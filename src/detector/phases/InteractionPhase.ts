import { IDetectionPhase, PhaseResult } from './IDetectionPhase.js';
import { DetectionContext } from './DetectionContext.js';
import { Candidate, InteractionAction } from '../../types/index.js';
import { withRole } from '../lib/BehaviorClassifier.js';
import { InteractionRunner, InteractionSimulator } from '../lib/InteractionSimulator.js';
import { ConcurrencyCoordinator } from '../lib/ConcurrencyCoordinator.js';

export type RunnerFactory = (context: DetectionContext) => InteractionRunner;

const defaultRunner: RunnerFactory = context => new InteractionSimulator(context.driver, {
    thresholds: context.config.thresholds,
    timing: context.config.timing,
    history: context.history,
    log: context.log
});

/**
 * Click targets: popup triggers first, then other clickable elements that are
 * not plain links (links navigate rather than reveal).
 */
export function clickTargets(candidates: Candidate[]): Candidate[] {
    const triggers = withRole(candidates, 'popup-trigger');
    const others = withRole(candidates, 'clickable').filter(c =>
        !c.roles.includes('popup-trigger') &&
        !(c.descriptor.tagName === 'a' && c.descriptor.attributes['href'] !== undefined)
    );
    return [...triggers, ...others];
}

/**
 * Simulates one action over its candidates through the bounded coordinator.
 */
export class InteractionPhase implements IDetectionPhase {
    readonly name: string;

    constructor(
        private action: InteractionAction,
        private createRunner: RunnerFactory = defaultRunner
    ) {
        this.name = action === 'hover' ? 'Hover' : 'Popup';
    }

    async execute(context: DetectionContext): Promise<PhaseResult> {
        const { config, log, results } = context;
        const hover = this.action === 'hover';

        if (hover ? !config.detectHover : !config.detectPopups) {
            log(`[${this.name}Phase] Disabled by configuration`);
            return { success: true };
        }

        const targets = hover ? withRole(results.candidates, 'hoverable') : clickTargets(results.candidates);
        if (targets.length === 0) {
            log(`[${this.name}Phase] No candidates`);
            return { success: true };
        }

        const coordinator = new ConcurrencyCoordinator(this.createRunner(context), log);
        const report = await coordinator.runAll(targets, this.action, {
            maxParallel: hover ? config.limits.hoverParallelism : config.limits.clickParallelism,
            maxCandidates: hover ? config.limits.maxHoverCandidates : config.limits.maxClickCandidates,
            signal: context.deadline.signal
        });

        if (hover) {
            results.hoverOutcomes = report.outcomes;
        } else {
            results.popupOutcomes = report.outcomes;
        }
        results[this.action] = {
            simulated: report.outcomes.length,
            skipped: report.skipped,
            abandoned: report.abandoned
        };

        const revealed = report.outcomes.filter(o => o.kind === 'revealed').length;
        log(`[${this.name}Phase] ${revealed}/${report.outcomes.length} simulations revealed content`);
        return { success: true };
    }
}
