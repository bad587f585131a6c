export { };

declare global {
    interface Window {
        // Listener tracker: event types registered per target via addEventListener
        __detectorListeners?: WeakMap<EventTarget, Set<string>>;
    }
}
