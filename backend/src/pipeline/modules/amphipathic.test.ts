import { describe, expect, it } from 'vitest';
import { calculateAmphipathic } from './amphipathic';

describe('calculateAmphipathic', () => {
    it('splits residues into basic, lipophilic and other', () => {
        expect(calculateAmphipathic('KRAALLGG')).toEqual({
            amphipathicScore: 75,
            basicCount: 2,
            lipophilicCount: 4,
            basicRatio: 25,
            lipophilicRatio: 50,
            otherCount: 2,
            otherRatio: 25
        });
    });

    it('rounds percentages to one decimal', () => {
        const metrics = calculateAmphipathic('KAG');
        expect(metrics.basicRatio).toBe(33.3);
        expect(metrics.lipophilicRatio).toBe(33.3);
        expect(metrics.amphipathicScore).toBe(66.7);
    });

    it('counts histidine as basic and tyrosine as lipophilic', () => {
        expect(calculateAmphipathic('HY')).toMatchObject({ basicCount: 1, lipophilicCount: 1, amphipathicScore: 100 });
    });

    it('returns zeros for an empty peptide', () => {
        expect(calculateAmphipathic('').amphipathicScore).toBe(0);
    });
});
