import {
    ElementDescriptor,
    FailedOutcome,
    FailureCode,
    InteractionAction,
    InteractionOutcome,
    PopupContent,
    RevealedElement,
    RevealedOutcome
} from '../../types/index.js';
import { PageDriver } from '../adapters/PageDriver.js';
import { ClassifierThresholds, DetectorTiming } from '../config/DetectorConfig.js';
import { LIMITS } from '../config/constants.js';
import { ClickCommand, HoverCommand } from '../commands/index.js';
import { diff, Fingerprint, OverlayFingerprint, OverlayNode } from './OverlayFingerprint.js';
import { OverlayDismisser } from './OverlayDismisser.js';
import { PopupHistory } from './PopupHistory.js';
import { ActionTimeoutError, ElementNotAttachedError } from '../../shared/errors/DetectorErrors.js';
import { ErrorHandler, ErrorSeverity } from '../../shared/utils/ErrorHandler.js';

/** Capability the coordinator drives. One call, one outcome; never throws. */
export interface InteractionRunner {
    simulate(action: InteractionAction, descriptor: ElementDescriptor): Promise<InteractionOutcome>;
}

export type SimulatorTiming = Pick<
    DetectorTiming,
    'navigationTimeoutMs' | 'actionTimeoutMs' | 'hoverSettleMs' | 'clickSettleMs' | 'popupCloseWaitMs'
>;

export interface SimulatorOptions {
    thresholds: ClassifierThresholds;
    timing: SimulatorTiming;
    /** Triggers that reveal an overlay on click are recorded here */
    history?: PopupHistory;
    log?: (msg: string) => void;
}

const toRevealed = (node: OverlayNode): RevealedElement => {
    const kind = node.kind === 'container' ? 'content' : node.kind;
    return node.href !== undefined
        ? { kind, descriptor: node.descriptor, href: node.href }
        : { kind, descriptor: node.descriptor };
};

/**
 * Performs one hover or click and reports what it revealed, as seen through
 * the overlay fingerprint before and after the action.
 */
export class InteractionSimulator implements InteractionRunner {
    private fingerprint: OverlayFingerprint;
    private dismisser: OverlayDismisser;
    private timing: SimulatorTiming;
    private history?: PopupHistory;
    private log: (msg: string) => void;

    constructor(private driver: PageDriver, options: SimulatorOptions) {
        this.timing = options.timing;
        this.history = options.history;
        this.log = options.log ?? console.log;
        this.fingerprint = new OverlayFingerprint(driver, options.thresholds);
        this.dismisser = new OverlayDismisser(driver, options.timing.popupCloseWaitMs);
    }

    async simulate(action: InteractionAction, trigger: ElementDescriptor): Promise<InteractionOutcome> {
        const startUrl = this.driver.url();

        try {
            const before = await this.fingerprint.capture();

            const commandOptions = { timeoutMs: this.timing.actionTimeoutMs };
            const command = action === 'hover'
                ? new HoverCommand(trigger.locator, commandOptions)
                : new ClickCommand(trigger.locator, commandOptions);
            await command.execute({ driver: this.driver });

            await this.driver.waitForTimeout(action === 'hover' ? this.timing.hoverSettleMs : this.timing.clickSettleMs);

            if (action === 'click' && this.driver.url() !== startUrl) {
                await this.returnTo(startUrl);
                return { kind: 'no-change', action, trigger, note: 'navigated' };
            }

            const after = await this.fingerprint.capture();
            const added = diff(before, after);
            if (added.length === 0) {
                return { kind: 'no-change', action, trigger };
            }

            return action === 'hover'
                ? this.hoverOutcome(trigger, added)
                : await this.clickOutcome(trigger, added, after);
        } catch (e) {
            return this.failure(action, trigger, e);
        }
    }

    /** Hover-revealed content is navigational: only links are kept */
    private hoverOutcome(trigger: ElementDescriptor, added: OverlayNode[]): InteractionOutcome {
        const links = added
            .filter(n => n.kind === 'link')
            .slice(0, LIMITS.MAX_REVEALED_LINKS)
            .map(toRevealed);

        if (links.length === 0) {
            return { kind: 'no-change', action: 'hover', trigger, note: 'no links revealed' };
        }
        return { kind: 'revealed', action: 'hover', trigger, revealed: links, actions: [] };
    }

    private async clickOutcome(trigger: ElementDescriptor, added: OverlayNode[], after: Fingerprint): Promise<RevealedOutcome> {
        const actions = added
            .filter(n => n.kind === 'link' || n.kind === 'action')
            .slice(0, LIMITS.MAX_POPUP_ACTIONS)
            .map(toRevealed);

        // New links may appear inside a container that was already on screen
        const containerKey = added[0].container;
        const container = added.find(n => n.kind === 'container')
            ?? after.nodes.find(n => n.key === containerKey);

        const outcome: RevealedOutcome = {
            kind: 'revealed',
            action: 'click',
            trigger,
            revealed: added.map(toRevealed),
            actions
        };
        if (container) {
            outcome.popup = this.popupContent(container);
        }

        this.history?.record(trigger);
        await this.dismiss(container?.key ?? containerKey);
        return outcome;
    }

    private popupContent(container: OverlayNode): PopupContent {
        return {
            title: container.heading || container.descriptor.text.substring(0, 50) || 'Untitled popup',
            content: container.body ?? container.descriptor.text
        };
    }

    private async dismiss(containerKey: string): Promise<void> {
        try {
            const method = await this.dismisser.dismiss(containerKey);
            this.log(`[Simulator] Dismissed overlay via ${method}`);
        } catch (e) {
            const info = ErrorHandler.handle(e, { component: 'Simulator', operation: 'dismiss' }, ErrorSeverity.SILENT);
            this.log(`[Simulator] Could not dismiss overlay: ${info.message}`);
        }
    }

    private async returnTo(url: string): Promise<void> {
        this.log(`[Simulator] Click navigated away, returning to ${url}`);
        try {
            await this.driver.navigate(url, this.timing.navigationTimeoutMs);
        } catch (e) {
            const info = ErrorHandler.handle(e, { component: 'Simulator', operation: 'returnTo' }, ErrorSeverity.SILENT);
            this.log(`[Simulator] Could not return to ${url}: ${info.message}`);
        }
    }

    private failure(action: InteractionAction, trigger: ElementDescriptor, error: unknown): FailedOutcome {
        let code: FailureCode;
        let reason: string;

        if (error instanceof ElementNotAttachedError) {
            code = 'element-detached';
            reason = 'element detached';
        } else if (error instanceof ActionTimeoutError) {
            code = 'action-timeout';
            reason = 'action timeout';
        } else {
            code = 'driver-error';
            reason = ErrorHandler.toError(error).message;
        }

        ErrorHandler.handle(error, {
            component: 'Simulator',
            operation: action,
            data: { locator: trigger.locator }
        }, ErrorSeverity.SILENT);
        this.log(`[Simulator] ${action} failed on ${trigger.locator}: ${reason}`);

        return { kind: 'failed', action, trigger, code, reason };
    }
}
