import { chromium, Browser } from 'playwright';
import { PlaywrightDriver } from './PlaywrightDriver.js';
import { BROWSER, TIMING } from '../../config/constants.js';

export interface SessionOptions {
    headless?: boolean;
    defaultTimeoutMs?: number;
}

/**
 * One browser, one context, one tab. The tab is the shared page resource
 * every simulation in a run acts on.
 */
export class PlaywrightSession {
    private constructor(private browser: Browser, readonly driver: PlaywrightDriver) { }

    static async launch(options: SessionOptions = {}): Promise<PlaywrightSession> {
        const browser = await chromium.launch({ headless: options.headless ?? true });
        try {
            const context = await browser.newContext({
                viewport: { width: BROWSER.VIEWPORT_WIDTH, height: BROWSER.VIEWPORT_HEIGHT },
                userAgent: BROWSER.USER_AGENT
            });
            // Probes are serialized from compiled code; tsx/esbuild may wrap
            // nested functions in a __name helper that the page does not define
            await context.addInitScript({ content: 'globalThis.__name = globalThis.__name || (fn => fn);' });
            const page = await context.newPage();
            page.setDefaultTimeout(options.defaultTimeoutMs ?? TIMING.ACTION_TIMEOUT * 6);

            // Downloads triggered by exploratory clicks are never wanted
            page.on('download', download => {
                download.cancel().catch(() => { /* already finished */ });
            });

            return new PlaywrightSession(browser, new PlaywrightDriver(page));
        } catch (e) {
            await browser.close();
            throw e;
        }
    }

    async close(): Promise<void> {
        await this.browser.close();
    }
}
