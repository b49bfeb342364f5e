import type {
    AcylationPtm,
    AmidationPtm,
    DisulfidePtm,
    GlycosylationPtm,
    PtmAnnotation,
    PyroglutamatePtm,
    SulfationPtm
} from '../../types';

// Longest first: a basic pair wins over a single basic residue
const AMIDATION_CONTEXTS = ['RR', 'RK', 'KR', 'KK', 'R', 'K'];

/**
 * Post-translational modification signatures on a single candidate.
 * Positions are one-based within the candidate.
 */
export class PtmAnnotator {
    public annotate(sequence: string, fullSequence?: string, start?: number, end?: number): PtmAnnotation[] {
        const ptms: PtmAnnotation[] = [];

        const amidation = this.detectCTerminalAmidation(sequence, fullSequence, end);
        if (amidation) ptms.push(amidation);

        const pyroglu = this.detectNTerminalPyroglutamate(sequence);
        if (pyroglu) ptms.push(pyroglu);

        const disulfide = this.detectDisulfideBonds(sequence);
        if (disulfide) ptms.push(disulfide);

        const acylation = this.detectNTerminalAcylation(sequence);
        if (acylation) ptms.push(acylation);

        ptms.push(...this.detectTyrosineSulfation(sequence));
        ptms.push(...this.detectNGlycosylation(sequence));

        if (start !== undefined && ptms.length > 0) {
            console.log(`[PTM] ${ptms.length} modification(s) on peptide at ${start + 1}-${end ?? '?'}`);
        }
        return ptms;
    }

    /**
     * Needs the residues after the candidate: a terminal G followed by one or
     * two basic residues. Without protein context the check does not run.
     */
    public detectCTerminalAmidation(sequence: string, fullSequence?: string, end?: number): AmidationPtm | null {
        if (!fullSequence || end === undefined || !Number.isInteger(end)) return null;
        if (!sequence.endsWith('G')) return null;
        if (end < 0 || end >= fullSequence.length) return null;

        const after = fullSequence.slice(end, end + 2);
        const context = AMIDATION_CONTEXTS.find(basic => after.startsWith(basic));
        if (!context) return null;

        const motif = `G${context}`;
        return {
            type: 'C-terminal amidation',
            shortName: 'C-amidation',
            enzyme: 'PAM',
            motif,
            position: 'C-terminus',
            description: `${motif} → -NH₂`
        };
    }

    public detectNTerminalPyroglutamate(sequence: string): PyroglutamatePtm | null {
        const first = sequence[0];
        if (first !== 'Q' && first !== 'E') return null;
        return {
            type: 'N-terminal pyroglutamate',
            shortName: 'N-pGlu',
            enzyme: first === 'Q' ? 'QPCT' : 'QPCTL',
            residue: first,
            position: 1,
            description: `${first} → pGlu`
        };
    }

    public detectDisulfideBonds(sequence: string): DisulfidePtm | null {
        const positions: number[] = [];
        for (let i = 0; i < sequence.length; i++) {
            if (sequence[i] === 'C') positions.push(i + 1);
        }
        if (positions.length < 2) return null;

        const count = Math.floor(positions.length / 2);
        return {
            type: 'Disulfide bonds',
            shortName: 'Disulfide',
            enzyme: 'PDI / ER oxidoreductases',
            positions,
            count,
            description: `${positions.length} Cys (≥${count} bonds)`
        };
    }

    // Ghrelin-type octanoylation on Ser3
    public detectNTerminalAcylation(sequence: string): AcylationPtm | null {
        if (!sequence.startsWith('GSSF')) return null;
        return {
            type: 'N-terminal acylation',
            shortName: 'N-acyl',
            enzyme: 'GOAT (MBOAT4)',
            residue: 'Ser3',
            position: 3,
            description: 'Ser3 octanoylation'
        };
    }

    public detectTyrosineSulfation(sequence: string): SulfationPtm[] {
        const hits: SulfationPtm[] = [];
        for (let i = 0; i < sequence.length; i++) {
            if (sequence[i] !== 'Y') continue;

            const window = sequence.slice(Math.max(0, i - 5), i + 6);
            const acidic = [...window].filter(aa => aa === 'D' || aa === 'E').length;
            if (acidic >= 2) {
                hits.push({
                    type: 'Tyrosine O-sulfation',
                    shortName: 'Y-sulfation',
                    enzyme: 'TPST1/TPST2',
                    residue: `Y${i + 1}`,
                    position: i + 1,
                    description: `Y${i + 1} → Y(SO₃)`
                });
            }
        }
        return hits;
    }

    public detectNGlycosylation(sequence: string): GlycosylationPtm[] {
        const hits: GlycosylationPtm[] = [];
        const pattern = /N[^P][ST]/g;

        let match: RegExpExecArray | null;
        while ((match = pattern.exec(sequence)) !== null) {
            const position = match.index + 1;
            hits.push({
                type: 'N-glycosylation',
                shortName: 'N-glyco',
                enzyme: 'Oligosaccharyltransferase',
                motif: match[0],
                position,
                description: `N${position} glycosylation`
            });
        }
        return hits;
    }

    /**
     * Renders the modified form without touching the original string. The
     * C-terminal truncation runs first so every later substitution still
     * addresses the original one-based positions.
     */
    public generateModifiedSequence(sequence: string, ptms: PtmAnnotation[]): string {
        if (ptms.length === 0) return sequence;

        const ordered = [
            ...ptms.filter(ptm => ptm.type === 'C-terminal amidation'),
            ...ptms.filter(ptm => ptm.type !== 'C-terminal amidation')
        ];

        const initial: RenderState = { residues: [...sequence], suffix: '' };
        const rendered = ordered.reduce(applyPtm, initial);
        return rendered.residues.join('') + rendered.suffix;
    }
}

interface RenderState {
    readonly residues: readonly string[];
    readonly suffix: string;
}

function replaceAt(residues: readonly string[], position: number, expected: string, token: string): readonly string[] {
    const index = position - 1;
    if (index < 0 || index >= residues.length || residues[index] !== expected) return residues;
    return residues.map((residue, i) => (i === index ? token : residue));
}

function applyPtm(state: RenderState, ptm: PtmAnnotation): RenderState {
    switch (ptm.type) {
        case 'C-terminal amidation':
            if (state.residues[state.residues.length - 1] !== 'G') return state;
            return { residues: state.residues.slice(0, -1), suffix: '-NH₂' };
        case 'N-terminal pyroglutamate':
            return { ...state, residues: replaceAt(state.residues, 1, ptm.residue, 'pGlu') };
        case 'N-terminal acylation':
            return { ...state, residues: replaceAt(state.residues, 1, 'G', 'G(C8:0)') };
        case 'Disulfide bonds':
            return {
                ...state,
                residues: ptm.positions.reduce(
                    (residues, position, i) => replaceAt(residues, position, 'C', `C${i + 1}`),
                    state.residues
                )
            };
        case 'Tyrosine O-sulfation':
            return { ...state, residues: replaceAt(state.residues, ptm.position, 'Y', 'Y(SO₃)') };
        case 'N-glycosylation':
            return { ...state, residues: replaceAt(state.residues, ptm.position, 'N', 'N(GlcNAc)') };
    }
}
