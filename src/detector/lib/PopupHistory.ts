import { ElementDescriptor } from '../../types/index.js';
import { textKey } from '../../shared/utils/text.js';

/**
 * Triggers that revealed an overlay when clicked in an earlier run.
 * Owned by the caller and passed to the classifier; nothing global.
 */
export class PopupHistory {
    private keys = new Set<string>();

    /** Text-keyed so the same trigger is recognized after a re-render moves it */
    static keyFor(descriptor: Pick<ElementDescriptor, 'tagName' | 'text' | 'locator'>): string {
        const text = textKey(descriptor.text);
        return `${descriptor.tagName}|${text || descriptor.locator}`;
    }

    record(descriptor: ElementDescriptor): void {
        this.keys.add(PopupHistory.keyFor(descriptor));
    }

    has(descriptor: Pick<ElementDescriptor, 'tagName' | 'text' | 'locator'>): boolean {
        return this.keys.has(PopupHistory.keyFor(descriptor));
    }

    get size(): number {
        return this.keys.size;
    }

    clear(): void {
        this.keys.clear();
    }
}
