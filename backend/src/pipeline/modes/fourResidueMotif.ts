import { CONFIG } from '../../config';
import type { ExtractOptions, IModeStrategy, SiteScanOptions } from '../../interfaces';
import type { CleavageSite, PeptideCandidate } from '../../types';
import { buildCandidate } from '../modules/candidate';

// R-X-(K/R)-R convertases (PC5/6/7 class): one cut, mature domain after it
export class FourResidueMotifMode implements IModeStrategy {
    public findSites(sequence: string, { signalLength }: SiteScanOptions): CleavageSite[] {
        const pattern = new RegExp(CONFIG.PATTERNS.fourResidue, 'g');
        const region = sequence.slice(signalLength);
        const sites: CleavageSite[] = [];

        let match: RegExpExecArray | null;
        while ((match = pattern.exec(region)) !== null) {
            const index = signalLength + match.index;
            sites.push({ position: index + 4, motif: match[0], index });
        }

        console.log(`[Detector] four-residue scan on ${region.length} aa: ${sites.length} site(s)`);
        return sites;
    }

    public extract(sequence: string, sites: CleavageSite[], { signalLength }: ExtractOptions): PeptideCandidate[] {
        const window = CONFIG.RANGES.FOUR_RESIDUE;
        const peptides: PeptideCandidate[] = [];

        for (const site of sites) {
            if (sequence.length - site.position >= CONFIG.FOUR_RESIDUE.MIN_MATURE_LENGTH) {
                peptides.push({
                    ...buildCandidate(sequence, {
                        start: site.position,
                        end: sequence.length,
                        cleavageMotifN: site.motif,
                        cleavageMotifC: 'END'
                    }, window),
                    peptideType: 'mature_form'
                });
            }

            if (site.index - signalLength >= CONFIG.FOUR_RESIDUE.MIN_PRODOMAIN_LENGTH) {
                peptides.push({
                    ...buildCandidate(sequence, {
                        start: signalLength,
                        end: site.index,
                        cleavageMotifN: 'SIGNAL',
                        cleavageMotifC: site.motif
                    }, window),
                    peptideType: 'prodomain'
                });
            }
        }
        return peptides;
    }
}
