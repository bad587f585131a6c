import { PageDriver } from './adapters/PageDriver.js';
import { Candidate, NavigationElement, PageAnalysis, PageMetadata } from '../types/index.js';
import { DetectorConfig, DetectorConfigOverrides, resolveDetectorConfig } from './config/DetectorConfig.js';
import { PopupHistory } from './lib/PopupHistory.js';
import { assemble } from './lib/AnalysisAssembler.js';
import {
    ClassificationPhase,
    DetectionContext,
    DetectionOrchestrator,
    InteractionPhase,
    NavigationMenuPhase,
    NavigationPhase,
    RunnerFactory
} from './phases/index.js';
import { ResponseCache, hashContent } from '../shared/cache/ResponseCache.js';
import { NavigationError } from '../shared/errors/DetectorErrors.js';
import { Deadline } from '../shared/utils/Deadline.js';

export interface DetectorOptions {
    config?: DetectorConfigOverrides;
    /** Shared across runs; analyses for the same URL and config are reused */
    cache?: ResponseCache<PageAnalysis>;
    /** Triggers that revealed popups in earlier runs */
    history?: PopupHistory;
    /** Replaces the browser-backed simulator, mainly for tests */
    createRunner?: RunnerFactory;
    log?: (msg: string) => void;
}

/** Classification-only result of a quick scan */
export interface ScanResult {
    url: string;
    title: string;
    candidates: Candidate[];
    navigationElements: NavigationElement[];
    metadata: Partial<PageMetadata> & { candidateCount: number; truncated: boolean; durationMs: number };
}

/**
 * InteractionDetector analyzes one page per call. Calls on the same driver
 * must not overlap: the page is a single shared resource.
 */
export class InteractionDetector {
    readonly config: DetectorConfig;
    private log: (msg: string) => void;

    constructor(private driver: PageDriver, private options: DetectorOptions = {}) {
        this.config = resolveDetectorConfig(options.config);
        this.log = options.log ?? console.log;
    }

    /**
     * Full analysis: navigate, classify, simulate hovers and clicks, collect
     * navigation. Rejects only with NavigationError; a run cut short by the
     * deadline resolves with `metadata.timedOut` set.
     */
    async analyze(url: string): Promise<PageAnalysis> {
        const { cache } = this.options;
        if (!cache) return await this.run(url);

        const key = hashContent(`analyze|${url}|${JSON.stringify(this.config)}`);
        if (cache.has(key)) this.log(`[Detector] Cache hit for ${url}`);
        return await cache.getOrCompute(key, () => this.run(url));
    }

    /** Classification without simulation */
    async scan(url: string): Promise<ScanResult> {
        const orchestrator = new DetectionOrchestrator()
            .addPhase(new NavigationPhase())
            .addPhase(new ClassificationPhase())
            .addPhase(new NavigationMenuPhase());

        const { context, deadline } = await this.execute(url, orchestrator);
        const { results } = context;
        return {
            url: results.finalUrl,
            title: results.title,
            candidates: results.candidates,
            navigationElements: results.navigationElements,
            metadata: {
                ...results.metadata,
                candidateCount: results.candidates.length,
                truncated: results.snapshotTruncated,
                durationMs: deadline.elapsed()
            }
        };
    }

    private async run(url: string): Promise<PageAnalysis> {
        const orchestrator = new DetectionOrchestrator()
            .addPhase(new NavigationPhase())
            .addPhase(new ClassificationPhase())
            .addPhase(new InteractionPhase('hover', this.options.createRunner))
            .addPhase(new InteractionPhase('click', this.options.createRunner))
            .addPhase(new NavigationMenuPhase());

        const { context, deadline } = await this.execute(url, orchestrator);
        const { results } = context;

        const analysis = assemble(results.finalUrl, results.title, results.hoverOutcomes, results.popupOutcomes, {
            navigationElements: results.navigationElements,
            metadata: {
                ...results.metadata,
                candidateCount: results.candidates.length,
                hoverSimulated: results.hover.simulated,
                clickSimulated: results.click.simulated,
                skippedByCap: results.hover.skipped + results.click.skipped,
                abandoned: results.hover.abandoned + results.click.abandoned,
                timedOut: deadline.expired,
                durationMs: deadline.elapsed()
            }
        });

        this.log(`[Detector] ${url}: ${analysis.hoverInteractions.length} hover, ` +
            `${analysis.popupInteractions.length} popup interactions in ${analysis.metadata.durationMs}ms` +
            (deadline.expired ? ' (deadline reached)' : ''));
        return analysis;
    }

    private async execute(
        url: string,
        orchestrator: DetectionOrchestrator
    ): Promise<{ context: DetectionContext; deadline: Deadline }> {
        const deadline = new Deadline(this.config.timing.runDeadlineMs);
        const context = new DetectionContext(this.driver, url, this.config, deadline, this.log, this.options.history);

        try {
            const result = await orchestrator.execute(context);
            if (!result.success) {
                // Only a failed load ends the run; later phases keep what they gathered
                if (result.cause instanceof NavigationError) throw result.cause;
                this.log(`[Detector] Continuing with partial results: ${result.error}`);
            }
        } finally {
            deadline.dispose();
        }

        return { context, deadline };
    }
}
