/**
 * Error taxonomy for the detection engine.
 *
 * Only NavigationError is fatal to a run; the others are absorbed into the
 * per-element outcome or treated as an absent signal.
 */

export type DetectorErrorCode =
    | 'ELEMENT_NOT_ATTACHED'
    | 'ACTION_TIMEOUT'
    | 'NAVIGATION_ERROR'
    | 'CLASSIFICATION_EVALUATION';

export abstract class DetectorError extends Error {
    abstract readonly code: DetectorErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The target element vanished between classification and action */
export class ElementNotAttachedError extends DetectorError {
    readonly code = 'ELEMENT_NOT_ATTACHED';

    constructor(public readonly locator: string, options?: { cause?: unknown }) {
        super(`Element is not attached to the document: ${locator}`, options);
    }
}

export class ActionTimeoutError extends DetectorError {
    readonly code = 'ACTION_TIMEOUT';

    constructor(public readonly locator: string, public readonly timeoutMs: number, options?: { cause?: unknown }) {
        super(`Action on ${locator} exceeded ${timeoutMs}ms`, options);
    }
}

export class NavigationError extends DetectorError {
    readonly code = 'NAVIGATION_ERROR';

    constructor(public readonly url: string, reason: string, options?: { cause?: unknown }) {
        super(`Failed to load ${url}: ${reason}`, options);
    }
}

export class ClassificationEvaluationError extends DetectorError {
    readonly code = 'CLASSIFICATION_EVALUATION';

    constructor(public readonly predicate: string, public readonly locator: string, options?: { cause?: unknown }) {
        super(`Predicate "${predicate}" could not be evaluated for ${locator}`, options);
    }
}

export function isDetectorError(error: unknown): error is DetectorError {
    return error instanceof DetectorError;
}
