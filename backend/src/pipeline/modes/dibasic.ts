import { CONFIG } from '../../config';
import type { ExtractOptions, IModeStrategy, SiteScanOptions } from '../../interfaces';
import type { CleavageSite, PeptideCandidate } from '../../types';
import { buildCandidate } from '../modules/candidate';

const MIN_STRICT_BODY = 4;

/**
 * Dibasic (KK/KR/RR/RK) convertase products, cut sequentially between sites.
 * The strict variant also refuses a motif right after another basic residue,
 * enforces spacing between accepted sites and drops short bodies.
 */
export class DibasicMode implements IModeStrategy {
    constructor(private readonly strict: boolean) { }

    public findSites(sequence: string, { signalLength, minSpacing }: SiteScanOptions): CleavageSite[] {
        const pattern = new RegExp(this.strict ? CONFIG.PATTERNS.strict : CONFIG.PATTERNS.permissive, 'g');
        const region = sequence.slice(signalLength);
        const sites: CleavageSite[] = [];

        let match: RegExpExecArray | null;
        while ((match = pattern.exec(region)) !== null) {
            const index = signalLength + match.index;
            const previous = sites[sites.length - 1];
            if (this.strict && previous && index - previous.position < minSpacing) {
                continue;
            }
            sites.push({ position: index + match[0].length, motif: match[0], index });
        }
        return sites;
    }

    public extract(sequence: string, sites: CleavageSite[], options: ExtractOptions): PeptideCandidate[] {
        if (sites.length < options.minSites) return [];

        const peptides: PeptideCandidate[] = [];
        let cursor = options.signalLength;
        let motifN = 'SIGNAL';

        for (const site of sites) {
            if (this.keeps(site.index - cursor, options.minSpacing)) {
                peptides.push(buildCandidate(sequence, {
                    start: cursor,
                    end: site.index,
                    cleavageMotifN: motifN,
                    cleavageMotifC: site.motif
                }));
            }
            cursor = Math.max(cursor, site.position);
            motifN = site.motif;
        }

        if (this.keeps(sequence.length - cursor, options.minSpacing)) {
            peptides.push(buildCandidate(sequence, {
                start: cursor,
                end: sequence.length,
                cleavageMotifN: motifN,
                cleavageMotifC: 'END'
            }));
        }
        return peptides;
    }

    private keeps(bodyLength: number, minSpacing: number): boolean {
        if (!this.strict) return bodyLength > 0;
        return bodyLength >= minSpacing && bodyLength >= MIN_STRICT_BODY;
    }
}
