import type { IModeStrategy } from '../../interfaces';
import { isDetectionMode } from '../../types';
import type { CleavageSite } from '../../types';
import { MODE_STRATEGIES } from '../modes';

export class CleavageDetector {
    constructor(private readonly strategies: Record<string, IModeStrategy> = MODE_STRATEGIES) { }

    /**
     * Sites after the signal region, ordered by index. An unknown mode or a
     * pattern that does not compile is a configuration fault: it is logged
     * and the scan reports no sites.
     */
    public findSites(sequence: string, mode: string, signalLength: number, minSpacing: number): CleavageSite[] {
        const strategy = isDetectionMode(mode) ? this.strategies[mode] : undefined;
        if (!strategy) {
            console.error(`[Detector] Unsupported detection mode: ${mode}`);
            return [];
        }

        try {
            return strategy.findSites(sequence, { signalLength, minSpacing });
        } catch (error) {
            if (error instanceof SyntaxError) {
                console.error(`[Detector] Invalid pattern for mode ${mode}:`, error.message);
                return [];
            }
            throw error;
        }
    }

    public isProhormone(sites: CleavageSite[], minSites: number): boolean {
        return sites.length >= minSites;
    }
}
