import { PageDriver } from '../adapters/PageDriver.js';
import { ElementSize } from '../../types/index.js';
import { CLICK_EVENTS, HOVER_EVENTS } from './ListenerTracker.js';
import { LIMITS } from '../config/constants.js';

/** Style delta an element (or one of its descendants) receives under :hover */
export interface HoverSample {
    opacityDelta: number;
    visibilityChange: boolean;
    transformChange: boolean;
}

export interface SnapshotElement {
    locator: string;
    tagName: string;
    text: string;
    attributes: Record<string, string>;
    /** null when the box could not be measured */
    size: ElementSize | null;
    /** null when the page's stylesheets could not be inspected */
    hover: HoverSample | null;
    /** Event types registered through addEventListener; null when the tracker is absent */
    listeners: string[] | null;
    hasOnclickProperty: boolean;
}

export interface DomSnapshot {
    url: string;
    elements: SnapshotElement[];
    truncated: boolean;
}

export interface SnapshotProbeArgs {
    maxElements: number;
    textMaxLength: number;
    trackedEvents: string[];
}

/**
 * In-page script. Walks visible elements under <body> in document order and
 * records the raw behavior samples the classifier needs. No decision is made
 * here; thresholds are applied in Node.
 *
 * Elements with a zero-size box are left out, as is everything inside a
 * display:none subtree. A box that cannot be measured is kept with a null size.
 */
export function domSnapshotScript(args: SnapshotProbeArgs): DomSnapshot {
    const SKIP_TAGS = new Set(['script', 'style', 'noscript', 'template', 'meta', 'link', 'head', 'svg', 'path', 'br']);
    const KEPT_ATTRIBUTES = new Set([
        'id', 'href', 'role', 'type', 'name', 'title', 'onclick', 'tabindex',
        'data-testid', 'data-toggle', 'data-bs-toggle',
        'ng-click', '@click', 'v-on:click', 'x-on:click'
    ]);

    const normalize = (value: string | null | undefined): string =>
        (value || '').replace(/\s+/g, ' ').trim().substring(0, args.textMaxLength).trim();

    const isUnique = (selector: string): boolean => {
        try {
            return document.querySelectorAll(selector).length === 1;
        } catch {
            return false;
        }
    };

    const structuralPath = (el: Element): string => {
        const parts: string[] = [];
        let node: Element | null = el;
        while (node && node !== document.body && node !== document.documentElement) {
            const tag = node.tagName.toLowerCase();
            let index = 1;
            let sibling = node.previousElementSibling;
            while (sibling) {
                if (sibling.tagName === node.tagName) index++;
                sibling = sibling.previousElementSibling;
            }
            parts.unshift(`${tag}:nth-of-type(${index})`);
            node = node.parentElement;
        }
        return ['body', ...parts].join(' > ');
    };

    const locatorFor = (el: Element): string => {
        if (el.id) {
            const byId = `#${CSS.escape(el.id)}`;
            if (isUnique(byId)) return byId;
        }
        const testId = el.getAttribute('data-testid');
        if (testId) {
            const byTestId = `[data-testid="${CSS.escape(testId)}"]`;
            if (isUnique(byTestId)) return byTestId;
        }
        return structuralPath(el);
    };

    // :hover rules grouped by the element that must be hovered
    interface HoverRule { hovered: string; rest: string; style: CSSStyleDeclaration }
    const collectHoverRules = (): HoverRule[] | null => {
        const collected: HoverRule[] = [];
        try {
            for (const sheet of Array.from(document.styleSheets)) {
                let rules: CSSRuleList;
                try {
                    rules = sheet.cssRules;
                } catch {
                    // cross-origin sheet
                    continue;
                }
                for (const rule of Array.from(rules)) {
                    if (!(rule instanceof CSSStyleRule) || !rule.selectorText.includes(':hover')) continue;
                    for (const selector of rule.selectorText.split(',')) {
                        const at = selector.indexOf(':hover');
                        if (at < 0) continue;
                        const hovered = selector.slice(0, at).replace(/:hover/g, '').trim() || '*';
                        const rest = selector.slice(at + ':hover'.length).replace(/:hover/g, '');
                        collected.push({ hovered, rest, style: rule.style });
                    }
                }
            }
        } catch {
            return null;
        }
        return collected;
    };
    const hoverRules = collectHoverRules();

    const hoverSample = (el: Element): HoverSample | null => {
        if (!hoverRules) return null;
        const sample: HoverSample = { opacityDelta: 0, visibilityChange: false, transformChange: false };
        for (const rule of hoverRules) {
            let affected: Element[];
            try {
                if (!el.matches(rule.hovered)) continue;
                affected = rule.rest.trim() === '' ? [el] : Array.from(el.querySelectorAll(`:scope${rule.rest}`));
            } catch {
                continue;
            }
            const opacity = rule.style.getPropertyValue('opacity');
            const visibility = rule.style.getPropertyValue('visibility');
            const display = rule.style.getPropertyValue('display');
            const transform = rule.style.getPropertyValue('transform');
            for (const target of affected) {
                const computed = window.getComputedStyle(target);
                if (opacity !== '') {
                    const delta = Math.abs(parseFloat(opacity) - parseFloat(computed.getPropertyValue('opacity') || '1'));
                    if (Number.isFinite(delta)) sample.opacityDelta = Math.max(sample.opacityDelta, delta);
                }
                if (visibility !== '' && visibility !== computed.getPropertyValue('visibility')) {
                    sample.visibilityChange = true;
                }
                if (display !== '' && (display === 'none') !== (computed.getPropertyValue('display') === 'none')) {
                    sample.visibilityChange = true;
                }
                if (transform !== '' && transform !== computed.getPropertyValue('transform')) {
                    sample.transformChange = true;
                }
            }
        }
        return sample;
    };

    const registry = window.__detectorListeners;
    const elements: SnapshotElement[] = [];
    let truncated = false;

    // display:none roots and their descendants, in document order
    const hidden = new Set<Element>();

    const all: Element[] = document.body ? Array.from(document.body.querySelectorAll('*')) : [];
    for (const el of all) {
        if (el.parentElement && hidden.has(el.parentElement)) {
            hidden.add(el);
            continue;
        }
        const tagName = el.tagName.toLowerCase();
        if (SKIP_TAGS.has(tagName) || el.closest('svg')) continue;

        const style = window.getComputedStyle(el);
        if (style.getPropertyValue('display') === 'none') {
            hidden.add(el);
            continue;
        }
        // visibility is inherited but a descendant may override it
        if (style.getPropertyValue('visibility') === 'hidden') continue;

        let size: ElementSize | null = null;
        try {
            const rect = el.getBoundingClientRect();
            size = { width: Math.round(rect.width), height: Math.round(rect.height) };
        } catch {
            size = null;
        }
        if (size && (size.width === 0 || size.height === 0)) continue;

        if (elements.length >= args.maxElements) {
            truncated = true;
            break;
        }

        const attributes: Record<string, string> = {};
        for (const attr of Array.from(el.attributes)) {
            if (KEPT_ATTRIBUTES.has(attr.name) || attr.name.startsWith('aria-')) {
                attributes[attr.name] = attr.name === 'href' && el instanceof HTMLAnchorElement ? el.href : attr.value;
            }
        }

        let text = el instanceof HTMLElement ? normalize(el.innerText) : normalize(el.textContent);
        if (!text) {
            text = normalize(el.getAttribute('aria-label') || el.getAttribute('title') ||
                (el instanceof HTMLInputElement ? el.value || el.placeholder : ''));
        }

        const registered = registry?.get(el);
        elements.push({
            locator: locatorFor(el),
            tagName,
            text,
            attributes,
            size,
            hover: hoverSample(el),
            listeners: registry
                ? (registered ? Array.from(registered).filter(type => args.trackedEvents.includes(type)) : [])
                : null,
            hasOnclickProperty: el instanceof HTMLElement && typeof el.onclick === 'function'
        });
    }

    return { url: location.href, elements, truncated };
}

export class DomSnapshotProbe {
    static async capture(driver: PageDriver, maxElements: number): Promise<DomSnapshot> {
        return await driver.evaluate(domSnapshotScript, {
            maxElements,
            textMaxLength: LIMITS.TEXT_MAX_LENGTH,
            trackedEvents: [...HOVER_EVENTS, ...CLICK_EVENTS]
        });
    }
}
