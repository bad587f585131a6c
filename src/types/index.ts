/** Box size of an element at capture time */
export interface ElementSize {
    width: number;
    height: number;
}

/** Stable identifying information for one DOM node */
export interface ElementDescriptor {
    /** CSS selector resolvable in the page */
    locator: string;
    /** Lower-case tag name */
    tagName: string;
    /** Whitespace-normalized visible text */
    text: string;
    /** Relevant attributes (href, role, aria-*, id, ...) */
    attributes: Record<string, string>;
    size?: ElementSize;
}

export type CandidateRole = 'hoverable' | 'clickable' | 'popup-trigger';

export interface Candidate {
    descriptor: ElementDescriptor;
    /** Never empty */
    roles: CandidateRole[];
}

export type InteractionAction = 'hover' | 'click';

export type RevealedKind = 'link' | 'action' | 'content';

export interface RevealedElement {
    kind: RevealedKind;
    descriptor: ElementDescriptor;
    href?: string;
}

export interface PopupContent {
    title: string;
    content: string;
}

export type FailureCode = 'element-detached' | 'action-timeout' | 'driver-error';

interface OutcomeBase {
    action: InteractionAction;
    trigger: ElementDescriptor;
}

export interface RevealedOutcome extends OutcomeBase {
    kind: 'revealed';
    revealed: RevealedElement[];
    /** Actionable elements inside the revealed subtree (click only) */
    actions: RevealedElement[];
    popup?: PopupContent;
}

export interface NoChangeOutcome extends OutcomeBase {
    kind: 'no-change';
    note?: string;
}

export interface FailedOutcome extends OutcomeBase {
    kind: 'failed';
    code: FailureCode;
    reason: string;
}

export type InteractionOutcome = RevealedOutcome | NoChangeOutcome | FailedOutcome;

export interface NavigationElement {
    descriptor: ElementDescriptor;
    href: string;
    hasDropdown: boolean;
}

export interface PageMetadata {
    description: string;
    language: string;
    hasNavigation: boolean;
    formCount: number;
    dialogCount: number;
}

export interface RunStatistics {
    candidateCount: number;
    hoverSimulated: number;
    clickSimulated: number;
    skippedByCap: number;
    abandoned: number;
    timedOut: boolean;
    durationMs: number;
}

export interface AnalysisDiagnostics {
    noChangeCount: number;
    failedCount: number;
    failures: Array<{ action: InteractionAction; trigger: string; code: FailureCode; reason: string }>;
}

/** Assembled result of one analysis run */
export interface PageAnalysis {
    url: string;
    title: string;
    hoverInteractions: RevealedOutcome[];
    popupInteractions: RevealedOutcome[];
    navigationElements: NavigationElement[];
    metadata: Partial<PageMetadata> & Partial<RunStatistics>;
    diagnostics: AnalysisDiagnostics;
}
