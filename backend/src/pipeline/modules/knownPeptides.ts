import type { AnnotatedPeptide, UniprotStatus } from '../../types';

export interface KnownPeptideMatch {
    uniprotStatus: UniprotStatus;
    uniprotName?: string;
    uniprotNote?: string;
    uniprotAccession?: string;
}

/** Compares a predicted peptide with the protein's annotated peptides and propeptides. */
export function matchKnownPeptide(sequence: string, annotated: AnnotatedPeptide[], accession?: string): KnownPeptideMatch {
    for (const known of annotated) {
        if (sequence === known.sequence) {
            return { uniprotStatus: 'exact', uniprotName: known.name, uniprotAccession: accession };
        }

        const offset = known.sequence.indexOf(sequence);
        if (offset >= 0) {
            let note = 'Internal fragment';
            if (offset === 0) note = 'N-terminal fragment';
            else if (offset + sequence.length === known.sequence.length) note = 'C-terminal fragment';
            return { uniprotStatus: 'partial', uniprotName: known.name, uniprotNote: note, uniprotAccession: accession };
        }

        if (sequence.includes(known.sequence)) {
            return { uniprotStatus: 'partial', uniprotName: known.name, uniprotNote: 'Extended form', uniprotAccession: accession };
        }
    }
    return { uniprotStatus: 'unknown' };
}
