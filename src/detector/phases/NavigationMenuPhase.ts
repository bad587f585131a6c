import { IDetectionPhase, PhaseResult } from './IDetectionPhase.js';
import { DetectionContext } from './DetectionContext.js';
import { NavigationProbe } from '../lib/NavigationProbe.js';

export class NavigationMenuPhase implements IDetectionPhase {
    readonly name = 'NavigationMenu';

    async execute(context: DetectionContext): Promise<PhaseResult> {
        const { navigationElements, metadata } = await NavigationProbe.collect(
            context.driver,
            context.config.limits.maxNavItems
        );
        context.results.navigationElements = navigationElements;
        context.results.metadata = metadata;

        const dropdowns = navigationElements.filter(n => n.hasDropdown).length;
        context.log(`[NavigationMenuPhase] ${navigationElements.length} navigation links (${dropdowns} with dropdown)`);
        return { success: true };
    }
}
