import * as crypto from 'crypto';
import { PageDriver } from '../adapters/PageDriver.js';
import { ElementDescriptor } from '../../types/index.js';
import { ClassifierThresholds } from '../config/DetectorConfig.js';
import { LIMITS } from '../config/constants.js';

export type OverlayNodeKind = 'container' | 'link' | 'action';

export interface OverlayNode {
    /** Structural path from <body>; doubles as the node's locator */
    key: string;
    kind: OverlayNodeKind;
    /** Key of the eligible container this node was found in */
    container: string;
    descriptor: ElementDescriptor;
    href?: string;
    /** Container only: first heading or aria-label */
    heading?: string;
    /** Container only: visible text, longer cut than descriptor.text */
    body?: string;
}

export interface Fingerprint {
    digest: string;
    nodes: OverlayNode[];
}

export interface FingerprintProbeArgs {
    minWidth: number;
    minHeight: number;
    minZIndex: number;
    textMaxLength: number;
    bodyMaxLength: number;
}

/**
 * In-page script. Lists overlay-eligible containers and the visible links and
 * actionable elements inside them. Keys carry structure only, never text, so
 * a text change inside an existing overlay does not produce a new key.
 */
export function overlayFingerprintScript(args: FingerprintProbeArgs): OverlayNode[] {
    const ACTION_SELECTOR = 'button, [role="button"], [role="menuitem"], input[type="submit"], input[type="button"]';

    const normalize = (value: string | null | undefined, max: number): string =>
        (value || '').replace(/\s+/g, ' ').trim().substring(0, max).trim();

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

    const isShown = (el: Element): boolean => {
        const style = window.getComputedStyle(el);
        if (style.getPropertyValue('display') === 'none' || style.getPropertyValue('visibility') === 'hidden') return false;
        if (parseFloat(style.getPropertyValue('opacity')) <= 0) return false;
        const rect = el.getBoundingClientRect();
        return rect.width > 0 && rect.height > 0;
    };

    const effectiveZIndex = (el: Element): number => {
        let max = Number.NEGATIVE_INFINITY;
        let node: Element | null = el;
        while (node && node !== document.documentElement) {
            const z = parseInt(window.getComputedStyle(node).getPropertyValue('z-index'), 10);
            if (Number.isFinite(z)) max = Math.max(max, z);
            node = node.parentElement;
        }
        return Number.isFinite(max) ? max : 0;
    };

    const textOf = (el: Element, max: number): string =>
        normalize(el instanceof HTMLElement ? el.innerText : el.textContent, max);

    const describe = (el: Element, key: string): ElementDescriptor => {
        const attributes: Record<string, string> = {};
        for (const name of ['href', 'role', 'aria-label', 'title', 'type']) {
            const value = el.getAttribute(name);
            if (value !== null) attributes[name] = value;
        }
        const rect = el.getBoundingClientRect();
        return {
            locator: key,
            tagName: el.tagName.toLowerCase(),
            text: textOf(el, args.textMaxLength) || normalize(el.getAttribute('aria-label'), args.textMaxLength),
            attributes,
            size: { width: Math.round(rect.width), height: Math.round(rect.height) }
        };
    };

    const nodes: OverlayNode[] = [];
    const seen = new Set<string>();
    const all: Element[] = document.body ? Array.from(document.body.querySelectorAll('*')) : [];

    for (const el of all) {
        const position = window.getComputedStyle(el).getPropertyValue('position');
        if (position !== 'fixed' && position !== 'absolute') continue;
        if (!isShown(el)) continue;
        const rect = el.getBoundingClientRect();
        if (rect.width < args.minWidth || rect.height < args.minHeight) continue;
        if (effectiveZIndex(el) < args.minZIndex) continue;

        const container = keyFor(el);
        if (!seen.has(container)) {
            seen.add(container);
            const headingEl = el.querySelector('h1, h2, h3, h4, [role="heading"]');
            nodes.push({
                key: container,
                kind: 'container',
                container,
                descriptor: describe(el, container),
                heading: (headingEl ? textOf(headingEl, args.textMaxLength) : '') ||
                    normalize(el.getAttribute('aria-label'), args.textMaxLength),
                body: textOf(el, args.bodyMaxLength)
            });
        }

        for (const link of Array.from(el.querySelectorAll('a[href]'))) {
            const key = keyFor(link);
            if (seen.has(key) || !isShown(link)) continue;
            seen.add(key);
            nodes.push({
                key,
                kind: 'link',
                container,
                descriptor: describe(link, key),
                href: link instanceof HTMLAnchorElement ? link.href : link.getAttribute('href') || ''
            });
        }

        for (const action of Array.from(el.querySelectorAll(ACTION_SELECTOR))) {
            const key = keyFor(action);
            if (seen.has(key) || !isShown(action)) continue;
            seen.add(key);
            nodes.push({ key, kind: 'action', container, descriptor: describe(action, key) });
        }
    }

    return nodes;
}

/** md5 over the sorted structural keys */
export function fingerprintDigest(nodes: OverlayNode[]): string {
    const keys = nodes.map(n => n.key).sort();
    return crypto.createHash('md5').update(keys.join('|')).digest('hex');
}

/**
 * Nodes present in `after` but not in `before`, compared by structural key.
 * Existing nodes whose text changed are not reported.
 */
export function diff(before: Fingerprint, after: Fingerprint): OverlayNode[] {
    if (before.digest === after.digest) return [];
    const known = new Set(before.nodes.map(n => n.key));
    return after.nodes.filter(n => !known.has(n.key));
}

export class OverlayFingerprint {
    constructor(
        private driver: PageDriver,
        private thresholds: ClassifierThresholds
    ) { }

    async capture(): Promise<Fingerprint> {
        const nodes = await this.driver.evaluate(overlayFingerprintScript, {
            minWidth: this.thresholds.overlayMinWidth,
            minHeight: this.thresholds.overlayMinHeight,
            minZIndex: this.thresholds.overlayMinZIndex,
            textMaxLength: LIMITS.TEXT_MAX_LENGTH,
            bodyMaxLength: LIMITS.POPUP_CONTENT_MAX_LENGTH
        });
        return { digest: fingerprintDigest(nodes), nodes };
    }
}
