import { DetectionContext } from './DetectionContext.js';

export interface PhaseResult {
    success: boolean;
    error?: string;
    /** Original error of a failed phase */
    cause?: unknown;
    continue?: boolean;
}

/**
 * Interface for all detection phases (Strategy Pattern).
 */
export interface IDetectionPhase {
    readonly name: string;
    execute(context: DetectionContext): Promise<PhaseResult>;
}
