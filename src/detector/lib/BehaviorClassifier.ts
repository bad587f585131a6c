import { Candidate, CandidateRole, ElementDescriptor } from '../../types/index.js';
import { ClassifierThresholds } from '../config/DetectorConfig.js';
import { DomSnapshot, SnapshotElement } from './DomSnapshotProbe.js';
import { CLICK_EVENTS, HOVER_EVENTS } from './ListenerTracker.js';
import { PopupHistory } from './PopupHistory.js';
import { ClassificationEvaluationError } from '../../shared/errors/DetectorErrors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';
import { normalizeText } from '../../shared/utils/text.js';

const INTERACTIVE_TAGS = new Set(['a', 'button']);
const INTERACTIVE_ARIA = ['aria-haspopup', 'aria-expanded'];
const FRAMEWORK_CLICK_ATTRIBUTES = ['onclick', 'ng-click', '@click', 'v-on:click', 'x-on:click', 'data-toggle', 'data-bs-toggle'];

const hoverEvents: readonly string[] = HOVER_EVENTS;
const clickEvents: readonly string[] = CLICK_EVENTS;

type Predicate = (el: SnapshotElement) => boolean;

/**
 * Hover signal: a :hover style delta on the element or its descendants, or a
 * registered hover listener.
 */
export function hasHoverSignal(el: SnapshotElement, thresholds: ClassifierThresholds): boolean {
    if (el.listeners?.some(type => hoverEvents.includes(type))) return true;
    if (!el.hover) throw new ClassificationEvaluationError('hover', el.locator);

    const { opacityDelta, visibilityChange, transformChange } = el.hover;
    return opacityDelta >= thresholds.minOpacityDelta || visibilityChange || transformChange;
}

/** Click signal: handler, ARIA interactivity or interactive tag, on a box of usable size. */
export function hasClickSignal(el: SnapshotElement, thresholds: ClassifierThresholds): boolean {
    if (!el.size) throw new ClassificationEvaluationError('click', el.locator);

    const hasHandler = el.hasOnclickProperty
        || (el.listeners?.some(type => clickEvents.includes(type)) ?? false)
        || FRAMEWORK_CLICK_ATTRIBUTES.some(name => name in el.attributes);
    const hasAria = el.attributes['role'] === 'button'
        || INTERACTIVE_ARIA.some(name => name in el.attributes);
    const isInteractiveTag = INTERACTIVE_TAGS.has(el.tagName);

    return (hasHandler || hasAria || isInteractiveTag)
        && el.size.width >= thresholds.minClickableSize
        && el.size.height >= thresholds.minClickableSize;
}

/** Popup-trigger signal, given that the element is already known to be clickable */
export function hasPopupSignal(el: SnapshotElement, history?: PopupHistory): boolean {
    const popup = el.attributes['aria-haspopup'];
    if (popup !== undefined && popup !== 'false') return true;
    return history?.has(el) ?? false;
}

function evaluatePredicate(name: string, el: SnapshotElement, predicate: Predicate): boolean {
    try {
        return predicate(el);
    } catch (e) {
        const error = e instanceof ClassificationEvaluationError
            ? e
            : new ClassificationEvaluationError(name, el.locator, { cause: e });
        ErrorHandler.handle(error, { component: 'BehaviorClassifier', operation: name }, ErrorSeverity.SILENT);
        return false;
    }
}

export function toDescriptor(el: SnapshotElement): ElementDescriptor {
    return {
        locator: el.locator,
        tagName: el.tagName,
        text: normalizeText(el.text),
        attributes: { ...el.attributes },
        ...(el.size ? { size: { ...el.size } } : {})
    };
}

/**
 * Assign candidate roles from behavior signals only. Elements with no role
 * are dropped; output follows snapshot (document) order.
 */
export function classify(
    snapshot: DomSnapshot,
    thresholds: ClassifierThresholds,
    history?: PopupHistory
): Candidate[] {
    const candidates: Candidate[] = [];

    for (const el of snapshot.elements) {
        const roles: CandidateRole[] = [];

        if (evaluatePredicate('hover', el, e => hasHoverSignal(e, thresholds))) {
            roles.push('hoverable');
        }
        const clickable = evaluatePredicate('click', el, e => hasClickSignal(e, thresholds));
        if (clickable) {
            roles.push('clickable');
            if (evaluatePredicate('popup', el, e => hasPopupSignal(e, history))) {
                roles.push('popup-trigger');
            }
        }

        if (roles.length > 0) {
            candidates.push({ descriptor: toDescriptor(el), roles });
        }
    }

    return candidates;
}

/** Candidates carrying `role`, in input order */
export function withRole(candidates: Candidate[], role: CandidateRole): Candidate[] {
    return candidates.filter(c => c.roles.includes(role));
}
