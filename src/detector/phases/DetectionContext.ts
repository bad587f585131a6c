import { PageDriver } from '../adapters/PageDriver.js';
import {
    Candidate,
    InteractionOutcome,
    NavigationElement,
    PageMetadata
} from '../../types/index.js';
import { DetectorConfig } from '../config/DetectorConfig.js';
import { PopupHistory } from '../lib/PopupHistory.js';
import { Deadline } from '../../shared/utils/Deadline.js';

export interface PhaseStatistics {
    simulated: number;
    skipped: number;
    abandoned: number;
}

export interface DetectionResults {
    finalUrl: string;
    title: string;
    candidates: Candidate[];
    snapshotTruncated: boolean;
    hoverOutcomes: InteractionOutcome[];
    popupOutcomes: InteractionOutcome[];
    navigationElements: NavigationElement[];
    metadata: Partial<PageMetadata>;
    hover: PhaseStatistics;
    click: PhaseStatistics;
}

/**
 * DetectionContext isolates state for one analysis run.
 * Nothing in it outlives the run except the caller-owned popup history.
 */
export class DetectionContext {
    public results: DetectionResults;

    constructor(
        public driver: PageDriver,
        public url: string,
        public config: DetectorConfig,
        public deadline: Deadline,
        public log: (msg: string) => void,
        public history?: PopupHistory
    ) {
        this.results = {
            finalUrl: url,
            title: '',
            candidates: [],
            snapshotTruncated: false,
            hoverOutcomes: [],
            popupOutcomes: [],
            navigationElements: [],
            metadata: {},
            hover: { simulated: 0, skipped: 0, abandoned: 0 },
            click: { simulated: 0, skipped: 0, abandoned: 0 }
        };
    }
}
