import type { IModeStrategy } from '../../interfaces';
import { isDetectionMode } from '../../types';
import type { CleavageSite, PeptideCandidate } from '../../types';
import { MODE_STRATEGIES } from '../modes';

export class PeptideExtractor {
    constructor(private readonly strategies: Record<string, IModeStrategy> = MODE_STRATEGIES) { }

    public extract(
        sequence: string,
        sites: CleavageSite[],
        signalLength: number,
        minSpacing: number,
        minSites: number,
        mode: string
    ): PeptideCandidate[] {
        const strategy = isDetectionMode(mode) ? this.strategies[mode] : undefined;
        if (!strategy) {
            console.error(`[Extractor] Unsupported detection mode: ${mode}`);
            return [];
        }
        return strategy.extract(sequence, sites, { signalLength, minSpacing, minSites });
    }
}
