/**
 * Centralized constants for the detector module.
 * Avoids magic numbers scattered across the codebase.
 */

// ============================================================
// TIMING CONSTANTS (milliseconds)
// ============================================================

export const TIMING = {
    /** Navigation timeout for the initial page load */
    NAVIGATION_TIMEOUT: 60000,

    /** Bounded wait for network idle after load */
    LOAD_STATE_TIMEOUT: 10000,

    /** Extra wait for late-rendered content after load */
    PAGE_LOAD_WAIT: 2000,

    /** Timeout for a single hover/click */
    ACTION_TIMEOUT: 5000,

    /** Settle interval after a hover (CSS transitions) */
    HOVER_SETTLE: 500,

    /** Settle interval after a click (popup animations) */
    CLICK_SETTLE: 1000,

    /** Wait after closing a revealed popup */
    POPUP_CLOSE_WAIT: 500,

    /** Overall budget for one analysis run */
    RUN_DEADLINE: 120000,
} as const;

// ============================================================
// SAMPLING LIMITS
// ============================================================

export const LIMITS = {
    /** Maximum hover candidates simulated per run */
    MAX_HOVER_CANDIDATES: 15,

    /** Maximum click candidates simulated per run */
    MAX_CLICK_CANDIDATES: 10,

    /** Concurrent hover simulations */
    HOVER_PARALLELISM: 3,

    /** Concurrent click simulations (popups need more isolation) */
    CLICK_PARALLELISM: 2,

    /** Maximum elements captured in one DOM snapshot */
    MAX_SNAPSHOT_ELEMENTS: 3000,

    /** Maximum navigation elements reported */
    MAX_NAV_ITEMS: 20,

    /** Maximum revealed links kept per outcome */
    MAX_REVEALED_LINKS: 10,

    /** Maximum actionable elements kept per popup */
    MAX_POPUP_ACTIONS: 5,

    /** Maximum stored length of element text */
    TEXT_MAX_LENGTH: 200,

    /** Maximum stored length of popup body text */
    POPUP_CONTENT_MAX_LENGTH: 500,

    /** Maximum navigation link text length */
    NAV_TEXT_MAX_LENGTH: 50,
} as const;

// ============================================================
// THRESHOLDS (behavior signal sensitivity)
// ============================================================

export const THRESHOLDS = {
    /** Minimum opacity change under :hover to count as a hover effect */
    MIN_OPACITY_DELTA: 0.1,

    /** Minimum width and height (px) to count as clickable */
    MIN_CLICKABLE_SIZE: 4,

    /** Minimum overlay container width (px) */
    OVERLAY_MIN_WIDTH: 40,

    /** Minimum overlay container height (px) */
    OVERLAY_MIN_HEIGHT: 20,

    /** Minimum effective z-index for overlay eligibility */
    OVERLAY_MIN_Z_INDEX: 1,
} as const;

// ============================================================
// BROWSER
// ============================================================

export const BROWSER = {
    VIEWPORT_WIDTH: 1920,
    VIEWPORT_HEIGHT: 1080,
    USER_AGENT:
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
        '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
} as const;

export const DETECTOR_CONSTANTS = {
    TIMING,
    LIMITS,
    THRESHOLDS,
    BROWSER,
} as const;

export default DETECTOR_CONSTANTS;
