import { CONFIG } from '../../config';
import type { PeptideCandidate } from '../../types';

export type LengthWindow = { MIN: number; MAX: number };

export interface CandidateSpan {
    start: number;
    end: number;
    cleavageMotifN: string;
    cleavageMotifC: string;
}

// Fresh candidate, not yet scored or annotated
export function buildCandidate(
    sequence: string,
    span: CandidateSpan,
    window: LengthWindow = CONFIG.RANGES.DIBASIC
): PeptideCandidate {
    const length = span.end - span.start;
    return {
        sequence: sequence.slice(span.start, span.end),
        start: span.start,
        end: span.end,
        length,
        inRange: window.MIN <= length && length <= window.MAX,
        cleavageMotifN: span.cleavageMotifN,
        cleavageMotifC: span.cleavageMotifC,
        bioactivityScore: 0,
        bioactivitySource: 'none',
        ptms: []
    };
}

export function isBasic(aa: string | undefined): boolean {
    return aa === 'K' || aa === 'R';
}
