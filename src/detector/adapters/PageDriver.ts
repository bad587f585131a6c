export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/** Function evaluated inside the page. Must be self-contained: it is serialized. */
export type PageScript<A, R> = (arg: A) => R | Promise<R>;

/**
 * The single page-interaction capability the engine depends on.
 *
 * Implementations report failures with the detector error taxonomy:
 * navigate → NavigationError; hover/click → ElementNotAttachedError or
 * ActionTimeoutError.
 */
export interface PageDriver {
    navigate(url: string, timeoutMs: number): Promise<void>;
    evaluate<A, R>(script: PageScript<A, R>, arg: A): Promise<R>;
    hover(locator: string, timeoutMs: number): Promise<void>;
    click(locator: string, timeoutMs: number): Promise<void>;
    /** Trusted key press on the focused element */
    press(key: string): Promise<void>;
    waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>;
    waitForTimeout(ms: number): Promise<void>;
    /** Register a script that runs before any page script on every navigation */
    addInitScript(script: () => void): Promise<void>;
    url(): string;
    title(): Promise<string>;
}
