import { CONFIG } from '../../config';
import type { BioactivityScore, IBioactivityOracle, ScoringContext } from '../../interfaces';
import type { PeptideCandidate } from '../../types';

const HYDROPHOBIC = new Set('ALIVMFWP');
const POSITIVE = new Set('KRH');
const NEGATIVE = new Set('DE');

// Motif families of well-characterised granin / VGF peptides
const KNOWN_BIOACTIVE_FAMILIES: ReadonlyArray<{ name: string; motifs: string[] }> = [
    { name: 'SECRETONEURIN', motifs: ['SNSQE', 'PGKQL', 'RLERL'] },
    { name: 'CHROMOGRANIN', motifs: ['WPRES', 'LQEEE', 'HLEAE'] },
    { name: 'VGF', motifs: ['TLQP', 'AQEE', 'NERP'] }
];

function count(sequence: string, residues: Set<string>): number {
    let n = 0;
    for (const aa of sequence) {
        if (residues.has(aa)) n++;
    }
    return n;
}

function hasAmidationSignature(peptide: string): boolean {
    return peptide.endsWith('RF') || peptide.endsWith('RFG') || peptide.endsWith('RY') || peptide.endsWith('RYG');
}

export class BioactivityScorer {
    constructor(private readonly oracle: IBioactivityOracle | null = null) { }

    /**
     * Local estimate from composition, length and processing context.
     * Always within [0, 100]; the empty string scores 0.
     */
    public calculateHeuristic(peptide: string, context: ScoringContext = {}): number {
        if (peptide.length === 0) return 0;

        const length = peptide.length;
        const { MIN, MAX } = CONFIG.RANGES.DIBASIC;
        let score = 0;

        score += (count(peptide, HYDROPHOBIC) / length) * 30;

        const positive = count(peptide, POSITIVE);
        if (positive > 0) score += 10;
        if (count(peptide, NEGATIVE) > 0) score += 10;

        if (MIN <= length && length <= MAX) {
            score += 35;
        } else if (length < MIN) {
            score -= 10;
        } else if (length > 100) {
            score -= 15;
        }

        if (peptide.includes('C')) score += 8;

        const prolines = count(peptide, new Set('P'));
        score += prolines <= 2 ? 7 : -5;

        if (new Set(peptide).size >= 6) score += 5;

        // Amidated C-terminus (RFamide-like)
        const amidated = hasAmidationSignature(peptide);
        if (amidated) score += 25;
        if (context.cleavageMotif && (context.cleavageMotif.includes('RF') || context.cleavageMotif.includes('RY'))) {
            score += 10;
        }

        for (const family of KNOWN_BIOACTIVE_FAMILIES) {
            if (family.motifs.some(motif => peptide.includes(motif))) {
                score += 15;
            }
        }

        // A fragment running into the protein's C-terminus cannot be amidated
        // unless it ends in G or is followed by a basic residue
        const { fullSequence, end } = context;
        if (fullSequence && end !== undefined && end > 0) {
            const atCTerminus = end >= fullSequence.length - 5;
            const basicAfter = /[KR]/.test(fullSequence.slice(end, end + 2));
            if (atCTerminus && !peptide.endsWith('G') && !basicAfter) {
                score -= 20;
            }
        }

        if (length < 5 && !(peptide.endsWith('RF') || peptide.endsWith('RY'))) {
            score -= 15;
        }

        if (count(peptide, new Set('KR')) / length > 0.5) {
            score -= 10;
        }

        return Math.max(0, Math.min(100, score));
    }

    /** Remote oracle first; any failure degrades this candidate alone to the heuristic. */
    public async score(peptide: string, context: ScoringContext = {}): Promise<BioactivityScore> {
        if (this.oracle) {
            try {
                const remote = await this.oracle.predict(peptide);
                if (remote !== null) {
                    return { score: Math.max(0, Math.min(100, remote)), source: 'remote' };
                }
            } catch (error) {
                console.warn('[Bioactivity] Oracle error, using heuristic:', error);
            }
        }
        return { score: this.calculateHeuristic(peptide, context), source: 'heuristic' };
    }

    // Fan out one call per candidate and gather; score() never rejects
    public async scoreBatch(candidates: PeptideCandidate[], fullSequence?: string): Promise<BioactivityScore[]> {
        return Promise.all(candidates.map(candidate => this.score(candidate.sequence, {
            cleavageMotif: candidate.cleavageMotifC,
            fullSequence,
            end: candidate.end
        })));
    }
}
