import { errors, Page } from 'playwright';
import { LoadState, PageDriver, PageScript } from '../PageDriver.js';
import {
    ActionTimeoutError,
    ElementNotAttachedError,
    NavigationError
} from '../../../shared/errors/DetectorErrors.js';

const DETACHED_PATTERN = /not attached|detached|element is not connected/i;

export class PlaywrightDriver implements PageDriver {
    constructor(private page: Page) { }

    async navigate(url: string, timeoutMs: number): Promise<void> {
        try {
            // domcontentloaded rather than networkidle: sites with continuous
            // network activity never reach idle
            await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
        } catch (e) {
            const reason = e instanceof errors.TimeoutError
                ? `timed out after ${timeoutMs}ms`
                : e instanceof Error ? e.message : String(e);
            throw new NavigationError(url, reason, { cause: e });
        }
    }

    async evaluate<A, R>(script: PageScript<A, R>, arg: A): Promise<R> {
        // Playwright's Unboxed<Arg> parameter type does not resolve for a generic A
        return await this.page.evaluate<R, A>(script as (arg: unknown) => R | Promise<R>, arg);
    }

    async hover(locator: string, timeoutMs: number): Promise<void> {
        await this.act(locator, timeoutMs, target => target.hover({ timeout: timeoutMs }));
    }

    async click(locator: string, timeoutMs: number): Promise<void> {
        await this.act(locator, timeoutMs, target => target.click({ timeout: timeoutMs }));
    }

    async press(key: string): Promise<void> {
        await this.page.keyboard.press(key);
    }

    async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
        await this.page.waitForLoadState(state, { timeout: timeoutMs });
    }

    async waitForTimeout(ms: number): Promise<void> {
        await this.page.waitForTimeout(ms);
    }

    async addInitScript(script: () => void): Promise<void> {
        await this.page.addInitScript(script);
    }

    url(): string {
        return this.page.url();
    }

    async title(): Promise<string> {
        return await this.page.title();
    }

    private async act(
        locator: string,
        timeoutMs: number,
        action: (target: ReturnType<Page['locator']>) => Promise<void>
    ): Promise<void> {
        const matches = this.page.locator(locator);
        if ((await matches.count()) === 0) {
            throw new ElementNotAttachedError(locator);
        }

        try {
            await action(matches.first());
        } catch (e) {
            if (e instanceof errors.TimeoutError) {
                // A timeout on a locator that no longer matches means the node was removed
                const stillThere = await matches.count().catch(() => 0);
                if (stillThere === 0) throw new ElementNotAttachedError(locator, { cause: e });
                throw new ActionTimeoutError(locator, timeoutMs, { cause: e });
            }
            if (e instanceof Error && DETACHED_PATTERN.test(e.message)) {
                throw new ElementNotAttachedError(locator, { cause: e });
            }
            throw e;
        }
    }
}
