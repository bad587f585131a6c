export * from './types/index.js';

export { InteractionDetector } from './detector/InteractionDetector.js';
export type { DetectorOptions, ScanResult } from './detector/InteractionDetector.js';

export type { PageDriver, PageScript, LoadState } from './detector/adapters/PageDriver.js';
export { PlaywrightDriver } from './detector/adapters/playwright/PlaywrightDriver.js';
export { PlaywrightSession } from './detector/adapters/playwright/PlaywrightSession.js';
export type { SessionOptions } from './detector/adapters/playwright/PlaywrightSession.js';

export {
    DEFAULT_THRESHOLDS,
    resolveDetectorConfig,
    combineOverrides,
    detectorConfigFromEnv
} from './detector/config/DetectorConfig.js';
export type {
    ClassifierThresholds,
    DetectorConfig,
    DetectorConfigOverrides,
    DetectorLimits,
    DetectorTiming
} from './detector/config/DetectorConfig.js';
export { DETECTOR_CONSTANTS } from './detector/config/constants.js';

export { classify, withRole } from './detector/lib/BehaviorClassifier.js';
export { DomSnapshotProbe } from './detector/lib/DomSnapshotProbe.js';
export type { DomSnapshot, SnapshotElement, HoverSample } from './detector/lib/DomSnapshotProbe.js';
export { OverlayFingerprint, diff } from './detector/lib/OverlayFingerprint.js';
export type { Fingerprint, OverlayNode } from './detector/lib/OverlayFingerprint.js';
export { InteractionSimulator } from './detector/lib/InteractionSimulator.js';
export type { InteractionRunner, SimulatorOptions } from './detector/lib/InteractionSimulator.js';
export { ConcurrencyCoordinator } from './detector/lib/ConcurrencyCoordinator.js';
export type { RunAllOptions, RunAllReport } from './detector/lib/ConcurrencyCoordinator.js';
export { assemble } from './detector/lib/AnalysisAssembler.js';
export { NavigationProbe } from './detector/lib/NavigationProbe.js';
export { PopupHistory } from './detector/lib/PopupHistory.js';

export { ResponseCache, hashContent } from './shared/cache/ResponseCache.js';
export type { ResponseCacheOptions } from './shared/cache/ResponseCache.js';
export * from './shared/errors/DetectorErrors.js';
export { ErrorHandler, ErrorSeverity } from './shared/utils/ErrorHandler.js';
