import { afterEach, describe, expect, it, vi } from 'vitest';
import type { CleavageSite, PeptideCandidate } from '../../types';
import { CleavageDetector } from './detector';
import { overlapFraction } from './confidence';
import { PeptideExtractor } from './extractor';

const cleavageDetector = new CleavageDetector();
const peptideExtractor = new PeptideExtractor();

const PROHORMONE = 'MKTLLLTLVVVTIVCLDLGYTGGGGKRAAAAAAAAAAKRSSSSSSSSSSKR';

function run(sequence: string, mode: string, signal: number, spacing: number, minSites: number): { sites: CleavageSite[], peptides: PeptideCandidate[] } {
    const sites = cleavageDetector.findSites(sequence, mode, signal, spacing);
    return { sites, peptides: peptideExtractor.extract(sequence, sites, signal, spacing, minSites, mode) };
}

function spans(peptides: PeptideCandidate[]) {
    return peptides.map(({ start, end, cleavageMotifN, cleavageMotifC }) => ({ start, end, cleavageMotifN, cleavageMotifC }));
}

function pseudoRandomSequence(seed: number, length: number): string {
    const alphabet = 'KRKRAGLSEFYPNQ';
    let state = seed;
    let out = '';
    for (let i = 0; i < length; i++) {
        state = (state * 16807) % 2147483647;
        out += alphabet[state % alphabet.length];
    }
    return out;
}

describe('PeptideExtractor', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('strict', () => {
        it('cuts a prohormone into the bodies between its sites', () => {
            const { peptides } = run(PROHORMONE, 'strict', 9, 5, 2);
            expect(spans(peptides)).toEqual([
                { start: 9, end: 25, cleavageMotifN: 'SIGNAL', cleavageMotifC: 'KR' },
                { start: 27, end: 37, cleavageMotifN: 'KR', cleavageMotifC: 'KR' },
                { start: 39, end: 49, cleavageMotifN: 'KR', cleavageMotifC: 'KR' }
            ]);
            expect(peptides.map(peptide => peptide.sequence)).toEqual(['VVTIVCLDLGYTGGGG', 'AAAAAAAAAA', 'SSSSSSSSSS']);
        });

        it('rebuilds the post-signal sequence from bodies and motifs', () => {
            const { sites, peptides } = run(PROHORMONE, 'strict', 9, 5, 2);
            const rebuilt = peptides.map((peptide, i) => peptide.sequence + sites[i].motif).join('');
            expect(rebuilt).toBe(PROHORMONE.slice(9));
        });

        it('emits the tail after the last site', () => {
            const sequence = PROHORMONE.slice(0, -2);
            const { sites, peptides } = run(sequence, 'strict', 9, 5, 2);
            expect(sites).toHaveLength(2);
            expect(spans(peptides)).toEqual([
                { start: 9, end: 25, cleavageMotifN: 'SIGNAL', cleavageMotifC: 'KR' },
                { start: 27, end: 37, cleavageMotifN: 'KR', cleavageMotifC: 'KR' },
                { start: 39, end: 49, cleavageMotifN: 'KR', cleavageMotifC: 'END' }
            ]);
        });

        it('returns nothing below the minimum site count', () => {
            expect(run(PROHORMONE, 'strict', 9, 5, 4).peptides).toEqual([]);
        });

        it('drops bodies shorter than the spacing', () => {
            const { peptides } = run('AAAAKRAAKRAAAAAAKRAAAA', 'strict', 0, 5, 1);
            expect(spans(peptides)).toEqual([
                { start: 6, end: 16, cleavageMotifN: 'KR', cleavageMotifC: 'KR' }
            ]);
        });

        it('drops a body under four residues even when the spacing allows it', () => {
            const { sites, peptides } = run('AAAAAAKRAAAKRAAAAAA', 'strict', 0, 1, 1);
            expect(sites.map(site => site.index)).toEqual([6, 11]);
            expect(spans(peptides)).toEqual([
                { start: 0, end: 6, cleavageMotifN: 'SIGNAL', cleavageMotifC: 'KR' },
                { start: 13, end: 19, cleavageMotifN: 'KR', cleavageMotifC: 'END' }
            ]);
        });

        it('builds unscored candidates with the dibasic length window', () => {
            const [first] = run(PROHORMONE, 'strict', 9, 5, 2).peptides;
            expect(first).toMatchObject({
                length: 16,
                inRange: true,
                bioactivityScore: 0,
                bioactivitySource: 'none',
                ptms: []
            });
        });
    });

    describe('permissive', () => {
        it('keeps every non-empty body', () => {
            const { peptides } = run('AAAAKRAAKRAAAAAAKRAAAA', 'permissive', 0, 5, 1);
            expect(spans(peptides)).toEqual([
                { start: 0, end: 4, cleavageMotifN: 'SIGNAL', cleavageMotifC: 'KR' },
                { start: 6, end: 8, cleavageMotifN: 'KR', cleavageMotifC: 'KR' },
                { start: 10, end: 16, cleavageMotifN: 'KR', cleavageMotifC: 'KR' },
                { start: 18, end: 22, cleavageMotifN: 'KR', cleavageMotifC: 'END' }
            ]);
        });

        it('keeps a three-residue body between sites', () => {
            const { peptides } = run('AAAAAAKRAAAKRAAAAAA', 'permissive', 0, 1, 1);
            expect(peptides.map(peptide => [peptide.start, peptide.end])).toEqual([[0, 6], [8, 11], [13, 19]]);
        });

        it('honours the minimum site count', () => {
            expect(run('AAAAKRAAKRAAAAAAKRAAAA', 'permissive', 0, 5, 4).peptides).toEqual([]);
        });
    });

    describe.each(['strict', 'permissive'])('%s bodies', mode => {
        it('are non-empty, ordered, in bounds and match their slice', () => {
            for (let seed = 1; seed <= 20; seed++) {
                const sequence = pseudoRandomSequence(seed, 120);
                const { peptides } = run(sequence, mode, 10, 3, 1);

                let previousEnd = 10;
                for (const peptide of peptides) {
                    expect(peptide.length).toBeGreaterThan(0);
                    expect(peptide.length).toBe(peptide.end - peptide.start);
                    expect(peptide.start).toBeGreaterThanOrEqual(previousEnd);
                    expect(peptide.end).toBeLessThanOrEqual(sequence.length);
                    expect(peptide.sequence).toBe(sequence.slice(peptide.start, peptide.end));
                    previousEnd = peptide.end;
                }
            }
        });

        it('come out the same on a second run', () => {
            const sequence = pseudoRandomSequence(42, 120);
            expect(run(sequence, mode, 10, 3, 1)).toEqual(run(sequence, mode, 10, 3, 1));
        });
    });

    describe('ultra-permissive', () => {
        it('prefers the shortest top-confidence span and drops heavy overlaps', () => {
            const { peptides } = run('AAKAAAAAAGRFGAAAAR', 'ultra-permissive', 0, 5, 1);
            expect(peptides.map(({ sequence, start, end, confidence, cleavageMotifN, cleavageMotifC }) =>
                ({ sequence, start, end, confidence, cleavageMotifN, cleavageMotifC }))).toEqual([
                { sequence: 'AAAAAAG', start: 3, end: 10, confidence: 100, cleavageMotifN: 'K...RFG', cleavageMotifC: 'R' },
                { sequence: 'FGAAAA', start: 11, end: 17, confidence: 35, cleavageMotifN: 'R', cleavageMotifC: 'R' }
            ]);
        });

        it('keeps every candidate within length, confidence and overlap bounds', () => {
            for (let seed = 3; seed <= 12; seed++) {
                const sequence = pseudoRandomSequence(seed, 160);
                const { peptides } = run(sequence, 'ultra-permissive', 15, 5, 1);

                expect(peptides.length).toBeLessThanOrEqual(50);
                for (const peptide of peptides) {
                    expect(peptide.length).toBeGreaterThanOrEqual(4);
                    expect(peptide.length).toBeLessThanOrEqual(50);
                    expect(peptide.confidence).toBeGreaterThanOrEqual(30);
                    expect(peptide.confidence).toBeLessThanOrEqual(100);
                    expect(peptide.sequence).toBe(sequence.slice(peptide.start, peptide.end));
                }
                for (let i = 0; i < peptides.length; i++) {
                    for (let j = i + 1; j < peptides.length; j++) {
                        expect(overlapFraction(peptides[i], peptides[j])).toBeLessThanOrEqual(0.7);
                    }
                }
            }
        });

        it('gives the same answer on a second run', () => {
            const sequence = pseudoRandomSequence(42, 160);
            expect(run(sequence, 'ultra-permissive', 15, 5, 1)).toEqual(run(sequence, 'ultra-permissive', 15, 5, 1));
        });
    });

    describe('four-residue-motif', () => {
        const sequence = 'MAAAA' + 'L'.repeat(25) + 'RSRR' + 'E'.repeat(12);

        it('emits the mature form and the prodomain', () => {
            const { peptides } = run(sequence, 'four-residue-motif', 5, 5, 1);
            expect(peptides.map(({ start, end, peptideType, inRange, cleavageMotifN, cleavageMotifC }) =>
                ({ start, end, peptideType, inRange, cleavageMotifN, cleavageMotifC }))).toEqual([
                { start: 34, end: 46, peptideType: 'mature_form', inRange: false, cleavageMotifN: 'RSRR', cleavageMotifC: 'END' },
                { start: 5, end: 30, peptideType: 'prodomain', inRange: true, cleavageMotifN: 'SIGNAL', cleavageMotifC: 'RSRR' }
            ]);
        });

        it('keeps a mature form of exactly ten residues and drops one of nine', () => {
            const base = 'MAAAA' + 'L'.repeat(25) + 'RSRR';
            const ten = run(base + 'E'.repeat(10), 'four-residue-motif', 5, 5, 1).peptides;
            const nine = run(base + 'E'.repeat(9), 'four-residue-motif', 5, 5, 1).peptides;

            expect(ten.map(peptide => [peptide.peptideType, peptide.length])).toEqual([['mature_form', 10], ['prodomain', 25]]);
            expect(nine.map(peptide => peptide.peptideType)).toEqual(['prodomain']);
        });

        it('skips a prodomain shorter than 20 residues', () => {
            const { peptides } = run(sequence, 'four-residue-motif', 15, 5, 1);
            expect(peptides.map(peptide => peptide.peptideType)).toEqual(['mature_form']);
        });
    });

    it('returns nothing for an unknown mode', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const sites = cleavageDetector.findSites(PROHORMONE, 'strict', 9, 5);
        expect(peptideExtractor.extract(PROHORMONE, sites, 9, 5, 1, 'aggressive')).toEqual([]);
    });
});
