import { IDetectionPhase, PhaseResult } from './IDetectionPhase.js';
import { DetectionContext } from './DetectionContext.js';
import { DomSnapshotProbe } from '../lib/DomSnapshotProbe.js';
import { classify } from '../lib/BehaviorClassifier.js';

export class ClassificationPhase implements IDetectionPhase {
    readonly name = 'Classification';

    async execute(context: DetectionContext): Promise<PhaseResult> {
        const { driver, config, log, results } = context;

        const snapshot = await DomSnapshotProbe.capture(driver, config.limits.maxSnapshotElements);
        results.snapshotTruncated = snapshot.truncated;
        results.candidates = classify(snapshot, config.thresholds, context.history);

        const count = (role: string) => results.candidates.filter(c => c.roles.some(r => r === role)).length;
        log(`[ClassificationPhase] ${snapshot.elements.length} elements -> ${results.candidates.length} candidates ` +
            `(hoverable ${count('hoverable')}, clickable ${count('clickable')}, popup-trigger ${count('popup-trigger')})`);
        if (snapshot.truncated) {
            log(`[ClassificationPhase] Snapshot truncated at ${config.limits.maxSnapshotElements} elements`);
        }

        return { success: true };
    }
}
