import type { AmphipathicMetrics } from '../../types';

const BASIC = new Set('KRH');
const LIPOPHILIC = new Set('AVLIMFWY');

const round1 = (value: number) => Math.round(value * 10) / 10;

// Coverage of basic plus lipophilic residues, in percent
export function calculateAmphipathic(sequence: string): AmphipathicMetrics {
    const total = sequence.length;
    if (total === 0) {
        return {
            amphipathicScore: 0,
            basicCount: 0,
            lipophilicCount: 0,
            basicRatio: 0,
            lipophilicRatio: 0,
            otherCount: 0,
            otherRatio: 0
        };
    }

    let basicCount = 0;
    let lipophilicCount = 0;
    for (const aa of sequence) {
        if (BASIC.has(aa)) basicCount++;
        else if (LIPOPHILIC.has(aa)) lipophilicCount++;
    }
    const otherCount = total - basicCount - lipophilicCount;

    const basicRatio = (basicCount / total) * 100;
    const lipophilicRatio = (lipophilicCount / total) * 100;

    return {
        amphipathicScore: round1(basicRatio + lipophilicRatio),
        basicCount,
        lipophilicCount,
        basicRatio: round1(basicRatio),
        lipophilicRatio: round1(lipophilicRatio),
        otherCount,
        otherRatio: round1((otherCount / total) * 100)
    };
}
