import { CliOptions, cliLogger, overridesFromOptions } from '../options.js';
import { PlaywrightSession } from '../../detector/adapters/playwright/PlaywrightSession.js';
import { InteractionDetector } from '../../detector/InteractionDetector.js';
import { isDetectorError } from '../../shared/errors/DetectorErrors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';

export type CliMode = 'detect' | 'scan';

/**
 * Shared body of `detect` and `scan`: one browser session, one page, JSON
 * result on stdout.
 */
export async function runDetection(mode: CliMode, options: CliOptions): Promise<void> {
    const url = options.url || process.env.DETECTOR_URL;
    if (!url) {
        console.error('Error: URL is required.');
        process.exit(1);
    }

    const log = cliLogger(options.quiet);
    const session = await PlaywrightSession.launch({ headless: options.headless ?? true });

    process.once('SIGINT', () => {
        log('\n[CLI] Interrupted, closing browser...');
        void session.close().then(() => process.exit(130), () => process.exit(130));
    });

    try {
        const detector = new InteractionDetector(session.driver, {
            config: overridesFromOptions(options),
            log
        });
        const result = mode === 'detect' ? await detector.analyze(url) : await detector.scan(url);
        process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        console.error(`[CLI] ${mode} failed${isDetectorError(e) ? ` (${e.code})` : ''}: ${message}`);
        process.exitCode = 1;
    } finally {
        await ErrorHandler.safeExecute(() => session.close(), { component: 'CLI', operation: 'close' }, undefined, ErrorSeverity.WARNING);
    }
}
