export type { IDetectionPhase, PhaseResult } from './IDetectionPhase.js';
export { DetectionContext } from './DetectionContext.js';
export type { DetectionResults, PhaseStatistics } from './DetectionContext.js';
export { DetectionOrchestrator } from './DetectionOrchestrator.js';
export { NavigationPhase } from './NavigationPhase.js';
export { ClassificationPhase } from './ClassificationPhase.js';
export { InteractionPhase, clickTargets } from './InteractionPhase.js';
export type { RunnerFactory } from './InteractionPhase.js';
export { NavigationMenuPhase } from './NavigationMenuPhase.js';
