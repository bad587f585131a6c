import { PageDriver } from '../adapters/PageDriver.js';
import { NavigationElement, PageMetadata } from '../../types/index.js';
import { LIMITS } from '../config/constants.js';

export interface NavigationProbeArgs {
    maxItems: number;
    textMaxLength: number;
}

export interface NavigationProbeResult {
    navigationElements: NavigationElement[];
    metadata: PageMetadata;
}

/**
 * In-page script. Collects visible links from navigation regions and basic
 * page metadata.
 */
export function navigationProbeScript(args: NavigationProbeArgs): NavigationProbeResult {
    const normalize = (value: string | null | undefined): string =>
        (value || '').replace(/\s+/g, ' ').trim().substring(0, args.textMaxLength).trim();

    const keyFor = (el: Element): string => {
        const parts: string[] = [];
        let node: Element | null = el;
        while (node && node !== document.body && node !== document.documentElement) {
            let index = 1;
            let sibling = node.previousElementSibling;
            while (sibling) {
                if (sibling.tagName === node.tagName) index++;
                sibling = sibling.previousElementSibling;
            }
            parts.unshift(`${node.tagName.toLowerCase()}:nth-of-type(${index})`);
            node = node.parentElement;
        }
        return ['body', ...parts].join(' > ');
    };

    const hasDropdown = (link: Element): boolean => {
        if (link.hasAttribute('aria-haspopup') || link.hasAttribute('aria-expanded')) return true;
        const item = link.closest('li');
        return !!item && item.querySelector('ul, ol, [role="menu"]') !== null;
    };

    const regions = 'nav a[href], [role="navigation"] a[href], header a[href]';
    const navigationElements: NavigationElement[] = [];
    const seenHrefs = new Set<string>();

    for (const link of Array.from(document.querySelectorAll(regions))) {
        if (navigationElements.length >= args.maxItems) break;
        if (!(link instanceof HTMLAnchorElement)) continue;

        const rect = link.getBoundingClientRect();
        if (rect.width === 0 || rect.height === 0) continue;

        const text = normalize(link.innerText) || normalize(link.getAttribute('aria-label'));
        if (!text || seenHrefs.has(link.href)) continue;
        seenHrefs.add(link.href);

        const attributes: Record<string, string> = { href: link.href };
        for (const name of ['aria-haspopup', 'aria-expanded', 'aria-label']) {
            const value = link.getAttribute(name);
            if (value !== null) attributes[name] = value;
        }

        navigationElements.push({
            descriptor: {
                locator: link.id ? `#${CSS.escape(link.id)}` : keyFor(link),
                tagName: 'a',
                text,
                attributes,
                size: { width: Math.round(rect.width), height: Math.round(rect.height) }
            },
            href: link.href,
            hasDropdown: hasDropdown(link)
        });
    }

    const description = document.querySelector('meta[name="description"]')?.getAttribute('content') || '';

    return {
        navigationElements,
        metadata: {
            description: description.replace(/\s+/g, ' ').trim(),
            language: document.documentElement.lang || '',
            hasNavigation: document.querySelector('nav, [role="navigation"]') !== null,
            formCount: document.forms.length,
            dialogCount: document.querySelectorAll('dialog, [role="dialog"], [role="alertdialog"]').length
        }
    };
}

export class NavigationProbe {
    static async collect(driver: PageDriver, maxItems: number = LIMITS.MAX_NAV_ITEMS): Promise<NavigationProbeResult> {
        return await driver.evaluate(navigationProbeScript, {
            maxItems,
            textMaxLength: LIMITS.NAV_TEXT_MAX_LENGTH
        });
    }
}
