import { PageDriver } from '../adapters/PageDriver.js';

/** Events whose registration counts as a hover handler */
export const HOVER_EVENTS = ['mouseenter', 'mouseover', 'pointerenter'] as const;

/** Events whose registration counts as a click/pointer handler */
export const CLICK_EVENTS = ['click', 'mousedown', 'mouseup', 'pointerdown', 'pointerup'] as const;

/**
 * Runs before any page script. Wraps EventTarget.prototype.addEventListener
 * so the snapshot probe can see handlers that leave no trace in the markup.
 * Serialized by the driver: everything it uses must live inside the function.
 */
export function listenerTrackerScript(): void {
    if (window.__detectorListeners) return;

    const registry = new WeakMap<EventTarget, Set<string>>();
    window.__detectorListeners = registry;

    const original = EventTarget.prototype.addEventListener;
    EventTarget.prototype.addEventListener = function (
        this: EventTarget,
        type: string,
        listener: EventListenerOrEventListenerObject | null,
        options?: boolean | AddEventListenerOptions
    ): void {
        if (listener) {
            const types = registry.get(this) ?? new Set<string>();
            types.add(type);
            registry.set(this, types);
        }
        original.call(this, type, listener, options);
    };
}

export class ListenerTracker {
    /** Register the tracker. Must happen before navigation to see early listeners. */
    static async install(driver: PageDriver): Promise<void> {
        await driver.addInitScript(listenerTrackerScript);
    }
}
