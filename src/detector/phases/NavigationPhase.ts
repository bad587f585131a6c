import { IDetectionPhase, PhaseResult } from './IDetectionPhase.js';
import { DetectionContext } from './DetectionContext.js';
import { ListenerTracker } from '../lib/ListenerTracker.js';
import { NavigationError } from '../../shared/errors/DetectorErrors.js';

export class NavigationPhase implements IDetectionPhase {
    readonly name = 'Navigation';

    async execute(context: DetectionContext): Promise<PhaseResult> {
        const { driver, url, log } = context;
        const { timing } = context.config;
        log(`[NavigationPhase] Navigating to: ${url}`);

        try {
            await ListenerTracker.install(driver);
            await driver.navigate(url, timing.navigationTimeoutMs);
        } catch (e: unknown) {
            const errorMessage = e instanceof Error ? e.message : String(e);
            log(`[NavigationPhase] Navigation failed: ${errorMessage}`);
            const cause = e instanceof NavigationError ? e : new NavigationError(url, errorMessage, { cause: e });
            return { success: false, error: errorMessage, cause };
        }

        // Pages with long-polling never go idle; the load itself already succeeded
        await driver.waitForLoadState('networkidle', timing.loadStateTimeoutMs).catch((e: unknown) => {
            log(`[NavigationPhase] Network did not settle: ${e instanceof Error ? e.message : String(e)}`);
        });
        await driver.waitForTimeout(timing.pageLoadWaitMs);

        context.results.finalUrl = driver.url();
        context.results.title = await driver.title();
        return { success: true };
    }
}
