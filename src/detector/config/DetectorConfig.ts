import { LIMITS, THRESHOLDS, TIMING } from './constants.js';

/** Sensitivity of the behavior signals. Selector strings are deliberately absent. */
export interface ClassifierThresholds {
    minOpacityDelta: number;
    minClickableSize: number;
    overlayMinWidth: number;
    overlayMinHeight: number;
    overlayMinZIndex: number;
}

export interface DetectorTiming {
    navigationTimeoutMs: number;
    loadStateTimeoutMs: number;
    pageLoadWaitMs: number;
    actionTimeoutMs: number;
    hoverSettleMs: number;
    clickSettleMs: number;
    popupCloseWaitMs: number;
    runDeadlineMs: number;
}

export interface DetectorLimits {
    maxHoverCandidates: number;
    maxClickCandidates: number;
    hoverParallelism: number;
    clickParallelism: number;
    maxSnapshotElements: number;
    maxNavItems: number;
}

export interface DetectorConfig {
    thresholds: ClassifierThresholds;
    timing: DetectorTiming;
    limits: DetectorLimits;
    detectHover: boolean;
    detectPopups: boolean;
}

export interface DetectorConfigOverrides {
    thresholds?: Partial<ClassifierThresholds>;
    timing?: Partial<DetectorTiming>;
    limits?: Partial<DetectorLimits>;
    detectHover?: boolean;
    detectPopups?: boolean;
}

export const DEFAULT_THRESHOLDS: ClassifierThresholds = {
    minOpacityDelta: THRESHOLDS.MIN_OPACITY_DELTA,
    minClickableSize: THRESHOLDS.MIN_CLICKABLE_SIZE,
    overlayMinWidth: THRESHOLDS.OVERLAY_MIN_WIDTH,
    overlayMinHeight: THRESHOLDS.OVERLAY_MIN_HEIGHT,
    overlayMinZIndex: THRESHOLDS.OVERLAY_MIN_Z_INDEX
};

/** Shallow merge that ignores undefined override values */
function merge<T extends object>(base: T, over: Partial<T> = {}): T {
    const result = { ...base };
    for (const key in base) {
        const value = over[key];
        if (value !== undefined) result[key] = value;
    }
    return result;
}

export function resolveDetectorConfig(overrides: DetectorConfigOverrides = {}): DetectorConfig {
    return {
        thresholds: merge(DEFAULT_THRESHOLDS, overrides.thresholds),
        timing: merge<DetectorTiming>({
            navigationTimeoutMs: TIMING.NAVIGATION_TIMEOUT,
            loadStateTimeoutMs: TIMING.LOAD_STATE_TIMEOUT,
            pageLoadWaitMs: TIMING.PAGE_LOAD_WAIT,
            actionTimeoutMs: TIMING.ACTION_TIMEOUT,
            hoverSettleMs: TIMING.HOVER_SETTLE,
            clickSettleMs: TIMING.CLICK_SETTLE,
            popupCloseWaitMs: TIMING.POPUP_CLOSE_WAIT,
            runDeadlineMs: TIMING.RUN_DEADLINE
        }, overrides.timing),
        limits: merge<DetectorLimits>({
            maxHoverCandidates: LIMITS.MAX_HOVER_CANDIDATES,
            maxClickCandidates: LIMITS.MAX_CLICK_CANDIDATES,
            hoverParallelism: LIMITS.HOVER_PARALLELISM,
            clickParallelism: LIMITS.CLICK_PARALLELISM,
            maxSnapshotElements: LIMITS.MAX_SNAPSHOT_ELEMENTS,
            maxNavItems: LIMITS.MAX_NAV_ITEMS
        }, overrides.limits),
        detectHover: overrides.detectHover ?? true,
        detectPopups: overrides.detectPopups ?? true
    };
}

function mergePartial<T extends object>(base: Partial<T> = {}, over: Partial<T> = {}): Partial<T> {
    const result = { ...base };
    for (const key in over) {
        const value = over[key];
        if (value !== undefined) result[key] = value;
    }
    return result;
}

/** Fold override layers left to right; later defined values win. */
export function combineOverrides(...layers: DetectorConfigOverrides[]): DetectorConfigOverrides {
    return layers.reduce<DetectorConfigOverrides>((acc, layer) => ({
        thresholds: mergePartial(acc.thresholds, layer.thresholds),
        timing: mergePartial(acc.timing, layer.timing),
        limits: mergePartial(acc.limits, layer.limits),
        detectHover: layer.detectHover ?? acc.detectHover,
        detectPopups: layer.detectPopups ?? acc.detectPopups
    }), {});
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isFinite(value) && value >= 0 ? value : undefined;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
    const raw = env[name]?.trim().toLowerCase();
    if (raw === undefined || raw === '') return undefined;
    return !['0', 'false', 'no', 'off'].includes(raw);
}

/**
 * Read DETECTOR_* environment variables. Unset or invalid values fall back
 * to the defaults in constants.ts.
 */
export function detectorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DetectorConfigOverrides {
    return {
        thresholds: {
            minOpacityDelta: readNumber(env, 'DETECTOR_MIN_OPACITY_DELTA'),
            minClickableSize: readNumber(env, 'DETECTOR_MIN_CLICKABLE_SIZE'),
            overlayMinWidth: readNumber(env, 'DETECTOR_OVERLAY_MIN_WIDTH'),
            overlayMinHeight: readNumber(env, 'DETECTOR_OVERLAY_MIN_HEIGHT'),
            overlayMinZIndex: readNumber(env, 'DETECTOR_OVERLAY_MIN_Z_INDEX')
        },
        timing: {
            actionTimeoutMs: readNumber(env, 'DETECTOR_ACTION_TIMEOUT_MS'),
            hoverSettleMs: readNumber(env, 'DETECTOR_HOVER_SETTLE_MS'),
            clickSettleMs: readNumber(env, 'DETECTOR_CLICK_SETTLE_MS'),
            runDeadlineMs: readNumber(env, 'DETECTOR_RUN_DEADLINE_MS')
        },
        limits: {
            maxHoverCandidates: readNumber(env, 'DETECTOR_MAX_HOVER_CANDIDATES'),
            maxClickCandidates: readNumber(env, 'DETECTOR_MAX_CLICK_CANDIDATES'),
            hoverParallelism: readNumber(env, 'DETECTOR_HOVER_PARALLELISM'),
            clickParallelism: readNumber(env, 'DETECTOR_CLICK_PARALLELISM')
        },
        detectHover: readFlag(env, 'DETECTOR_HOVER'),
        detectPopups: readFlag(env, 'DETECTOR_POPUPS')
    };
}
