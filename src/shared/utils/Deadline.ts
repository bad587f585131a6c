/**
 * Single run deadline. Exposes an AbortSignal so long operations can stop
 * dispatching work once the budget is spent.
 */
export class Deadline {
    private controller = new AbortController();
    private timer: ReturnType<typeof setTimeout> | null = null;
    readonly startedAt: number;

    constructor(readonly budgetMs: number) {
        this.startedAt = Date.now();
        if (Number.isFinite(budgetMs) && budgetMs > 0) {
            this.timer = setTimeout(() => this.controller.abort(), budgetMs);
        }
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    get expired(): boolean {
        return this.controller.signal.aborted;
    }

    elapsed(): number {
        return Date.now() - this.startedAt;
    }

    /** Stop the timer. Must be called once the run is over. */
    dispose(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}

/** Resolves when the signal aborts; never rejects. */
export function whenAborted(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.resolve();
    return new Promise(resolve => {
        signal.addEventListener('abort', () => resolve(), { once: true });
    });
}
