import { PageDriver } from '../adapters/PageDriver.js';

export type DismissMethod = 'close-button' | 'escape';

/**
 * In-page script. Clicks the first close-like control inside the container.
 * Returns false when there is none.
 */
export function dismissOverlayScript(containerKey: string): boolean {
    const CLOSE_PATTERN = /^(close|dismiss|cancel|×|✕|✖|x)$/i;
    const CLOSE_LABEL_PATTERN = /close|dismiss/i;

    let container: Element | null = null;
    try {
        container = document.querySelector(containerKey);
    } catch {
        container = null;
    }
    if (!container) return false;

    const controls = Array.from(container.querySelectorAll('button, [role="button"], a'));
    for (const control of controls) {
        if (!(control instanceof HTMLElement)) continue;
        const text = (control.innerText || '').trim();
        const label = control.getAttribute('aria-label') || control.getAttribute('title') || '';
        if (CLOSE_PATTERN.test(text) || CLOSE_LABEL_PATTERN.test(label)) {
            control.click();
            return true;
        }
    }
    return false;
}

/**
 * Closes a revealed overlay: its own close control when it has one, otherwise
 * a real Escape key press (native dialogs ignore synthetic key events).
 */
export class OverlayDismisser {
    constructor(private driver: PageDriver, private closeWaitMs: number) { }

    async dismiss(containerKey: string): Promise<DismissMethod> {
        const clicked = await this.driver.evaluate(dismissOverlayScript, containerKey);
        if (!clicked) {
            await this.driver.press('Escape');
        }
        await this.driver.waitForTimeout(this.closeWaitMs);
        return clicked ? 'close-button' : 'escape';
    }
}
