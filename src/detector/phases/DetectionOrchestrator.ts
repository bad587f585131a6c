import { DetectionContext } from './DetectionContext.js';
import { IDetectionPhase, PhaseResult } from './IDetectionPhase.js';

/**
 * DetectionOrchestrator runs phases in order. Once the run deadline has
 * passed, remaining phases are skipped and the run still succeeds.
 */
export class DetectionOrchestrator {
    private phases: IDetectionPhase[] = [];

    public addPhase(phase: IDetectionPhase): this {
        this.phases.push(phase);
        return this;
    }

    public get phaseNames(): string[] {
        return this.phases.map(p => p.name);
    }

    public async execute(context: DetectionContext): Promise<PhaseResult> {
        const { log } = context;
        log(`[Orchestrator] Starting detection for: ${context.url}`);

        for (const phase of this.phases) {
            if (context.deadline.expired) {
                log(`[Orchestrator] Deadline reached, skipping Phase: ${phase.name}`);
                continue;
            }

            log(`[Orchestrator] Executing Phase: ${phase.name}`);
            try {
                const result = await phase.execute(context);

                if (!result.success) {
                    log(`[Orchestrator] Phase ${phase.name} failed: ${result.error}`);
                    return result;
                }

                if (result.continue === false) {
                    log(`[Orchestrator] Phase ${phase.name} requested early termination.`);
                    break;
                }
            } catch (e) {
                const error = e instanceof Error ? e.message : String(e);
                log(`[Orchestrator] Critical error in Phase ${phase.name}: ${error}`);
                return { success: false, error, cause: e };
            }
        }

        log(`[Orchestrator] Detection complete for: ${context.url}`);
        return { success: true };
    }
}
