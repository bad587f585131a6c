import { Candidate, InteractionAction, InteractionOutcome } from '../../types/index.js';
import { InteractionRunner } from './InteractionSimulator.js';
import { whenAborted } from '../../shared/utils/Deadline.js';

export interface RunAllOptions {
    /** Simulations in flight at once (minimum 1) */
    maxParallel: number;
    /** Candidates beyond this are not simulated */
    maxCandidates?: number;
    /** Aborting stops dispatch and abandons in-flight simulations */
    signal?: AbortSignal;
    /** Called with the number of simulations currently in flight, on every change */
    onInFlightChange?: (inFlight: number) => void;
}

export interface RunAllReport {
    /** Completed outcomes, in input order */
    outcomes: InteractionOutcome[];
    /** Candidates dropped by the cap */
    skipped: number;
    /** Candidates not completed because the signal aborted */
    abandoned: number;
}

/**
 * Bounded worker pool over simulations. Workers pull the next index from a
 * shared cursor and write into a buffer slot owned by that index, so output
 * order is input order whatever the completion order.
 */
export class ConcurrencyCoordinator {
    constructor(
        private runner: InteractionRunner,
        private log: (msg: string) => void = console.log
    ) { }

    async runAll(candidates: Candidate[], action: InteractionAction, options: RunAllOptions): Promise<RunAllReport> {
        const cap = Math.max(0, options.maxCandidates ?? candidates.length);
        const work = candidates.slice(0, cap);
        const skipped = candidates.length - work.length;
        const results: Array<InteractionOutcome | undefined> = new Array(work.length).fill(undefined);
        const { signal } = options;

        let cursor = 0;
        let inFlight = 0;

        const track = (delta: number): void => {
            inFlight += delta;
            options.onInFlightChange?.(inFlight);
        };

        const worker = async (): Promise<void> => {
            while (!signal?.aborted && cursor < work.length) {
                const index = cursor++;
                track(1);
                const trigger = work[index].descriptor;
                try {
                    results[index] = await this.runner.simulate(action, trigger);
                } catch (e) {
                    // A runner that breaks its contract still only fails its own slot
                    const reason = e instanceof Error ? e.message : String(e);
                    results[index] = { kind: 'failed', action, trigger, code: 'driver-error', reason };
                } finally {
                    track(-1);
                }
            }
        };

        const poolSize = Math.min(Math.max(1, options.maxParallel), work.length);
        if (skipped > 0) {
            this.log(`[Coordinator] ${action}: sampling ${work.length} of ${candidates.length} candidates`);
        }

        const pool = Promise.all(Array.from({ length: poolSize }, () => worker()));
        if (signal) {
            // In-flight simulations keep running on the page but are no longer awaited
            await Promise.race([pool, whenAborted(signal)]);
        } else {
            await pool;
        }

        const outcomes = results.filter((o): o is InteractionOutcome => o !== undefined);
        const abandoned = work.length - outcomes.length;
        if (abandoned > 0) {
            this.log(`[Coordinator] ${action}: deadline reached, ${abandoned} simulation(s) abandoned`);
        }

        return { outcomes, skipped, abandoned };
    }
}
