import {
    DetectorConfigOverrides,
    combineOverrides,
    detectorConfigFromEnv
} from '../detector/config/DetectorConfig.js';

/** Raw option values as commander hands them over */
export interface CliOptions {
    url?: string;
    hoverParallel?: string;
    clickParallel?: string;
    maxHover?: string;
    maxClick?: string;
    deadline?: string;
    hover?: boolean;
    popups?: boolean;
    headless?: boolean;
    quiet?: boolean;
}

export function parseCount(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = parseInt(value, 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

/** Environment first, then command-line flags; unset flags leave env values alone */
export function overridesFromOptions(options: CliOptions, env: NodeJS.ProcessEnv = process.env): DetectorConfigOverrides {
    return combineOverrides(detectorConfigFromEnv(env), {
        timing: { runDeadlineMs: parseCount(options.deadline) },
        limits: {
            hoverParallelism: parseCount(options.hoverParallel),
            clickParallelism: parseCount(options.clickParallel),
            maxHoverCandidates: parseCount(options.maxHover),
            maxClickCandidates: parseCount(options.maxClick)
        },
        // commander sets these to true by default; only an explicit --no-* counts
        detectHover: options.hover === false ? false : undefined,
        detectPopups: options.popups === false ? false : undefined
    });
}

/** Logs go to stderr so stdout carries only the JSON result */
export function cliLogger(quiet: boolean | undefined): (msg: string) => void {
    return quiet ? () => undefined : msg => console.error(msg);
}
