import { afterEach, beforeEach, vi } from 'vitest';

const DEFAULT_BOX = { width: 100, height: 20 };

function boxOf(el: Element): { width: number; height: number } {
    const match = /^(\d+)x(\d+)$/.exec(el.getAttribute('data-box') ?? '');
    return match ? { width: Number(match[1]), height: Number(match[2]) } : DEFAULT_BOX;
}

/**
 * jsdom does no layout: every element measures 100x20 unless it carries
 * data-box="WxH". innerText falls back to textContent.
 */
export function useLayout(): void {
    beforeEach(() => {
        vi.spyOn(Element.prototype, 'getBoundingClientRect').mockImplementation(function (this: Element): DOMRect {
            const { width, height } = boxOf(this);
            return {
                x: 0,
                y: 0,
                top: 0,
                left: 0,
                right: width,
                bottom: height,
                width,
                height,
                toJSON: () => ({ width, height })
            };
        });
        Object.defineProperty(HTMLElement.prototype, 'innerText', {
            configurable: true,
            get(this: HTMLElement): string {
                return this.textContent ?? '';
            }
        });
        document.head.innerHTML = '';
        document.body.innerHTML = '';
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });
}
