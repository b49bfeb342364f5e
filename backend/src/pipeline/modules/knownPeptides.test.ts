import { describe, expect, it } from 'vitest';
import type { AnnotatedPeptide } from '../../types';
import { matchKnownPeptide } from './knownPeptides';

const annotated: AnnotatedPeptide[] = [
    { name: 'Test peptide', start: 10, end: 17, sequence: 'AAAAGGGG' }
];

describe('matchKnownPeptide', () => {
    it('reports an exact match with the accession', () => {
        expect(matchKnownPeptide('AAAAGGGG', annotated, 'P00001')).toEqual({
            uniprotStatus: 'exact',
            uniprotName: 'Test peptide',
            uniprotAccession: 'P00001'
        });
    });

    it('names where a fragment sits in the annotated peptide', () => {
        expect(matchKnownPeptide('AAAA', annotated).uniprotNote).toBe('N-terminal fragment');
        expect(matchKnownPeptide('GGGG', annotated).uniprotNote).toBe('C-terminal fragment');
        expect(matchKnownPeptide('AAGG', annotated).uniprotNote).toBe('Internal fragment');
    });

    it('recognises an extended form', () => {
        expect(matchKnownPeptide('SAAAAGGGGS', annotated)).toMatchObject({ uniprotStatus: 'partial', uniprotNote: 'Extended form' });
    });

    it('reports unknown peptides', () => {
        expect(matchKnownPeptide('WWWW', annotated)).toEqual({ uniprotStatus: 'unknown' });
        expect(matchKnownPeptide('AAAA', [])).toEqual({ uniprotStatus: 'unknown' });
    });
});
