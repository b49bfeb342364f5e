import { CONFIG } from '../../config';
import type { CleavageSite } from '../../types';
import { isBasic } from './candidate';

/**
 * Ultra-permissive candidate as indices into the site array.
 * `from === to` marks an amidation site's own span.
 */
export interface SiteSpan {
    from: number;
    to: number;
    start: number;
    end: number;
    confidence: number;
}

const AMIDATION_SIGNATURE = /R[FY]G?$/;

export function isDibasicMotif(motif: string): boolean {
    return motif.length === 2 && isBasic(motif[0]) && isBasic(motif[1]);
}

export function lengthBandBonus(length: number): number {
    if (length > 100) return -30;
    if (length > 50) return -10;
    if (length > 25) return 0;
    if (length > 15) return 10;
    if (length >= 5) return 20;
    return 0;
}

export function scoreConfidence(sequence: string, sites: CleavageSite[], from: number, to: number, start: number, end: number): number {
    const nSite = sites[from];
    const cSite = sites[to];
    const body = sequence.slice(start, end);
    let score = 0;

    // N-terminal motif class
    const amidationChain = nSite.amidationEnd !== undefined;
    const basicPair = isDibasicMotif(nSite.motif) || (isBasic(nSite.motif) && isBasic(sequence[nSite.index - 1]));
    score += amidationChain || basicPair ? 50 : 15;

    const cTerminalAmidation = body.endsWith('G') && isBasic(sequence[end]);
    if (cTerminalAmidation) score += 50;

    const signature = AMIDATION_SIGNATURE.test(body);
    if (signature) {
        score += 30;
    } else if (body.endsWith('G')) {
        score += 15;
    }

    score += lengthBandBonus(body.length);

    const closedByAmidationSite = cSite.amidationEnd !== undefined && cSite.amidationEnd === end;
    if (cTerminalAmidation || signature || closedByAmidationSite) {
        score = Math.max(score, CONFIG.ULTRA_PERMISSIVE.AMIDATION_FLOOR);
    }

    return Math.max(0, Math.min(100, score));
}

/** Shared residues over the shorter span's length. */
export function overlapFraction(a: { start: number; end: number }, b: { start: number; end: number }): number {
    const shared = Math.min(a.end, b.end) - Math.max(a.start, b.start);
    const shorter = Math.min(a.end - a.start, b.end - b.start);
    if (shared <= 0 || shorter <= 0) return 0;
    return shared / shorter;
}

export function rankSpans(spans: SiteSpan[]): SiteSpan[] {
    return [...spans].sort((a, b) =>
        b.confidence - a.confidence
        || (a.end - a.start) - (b.end - b.start)
        || a.start - b.start
        || a.end - b.end
    );
}

// Greedy pass in rank order: a span survives only if it does not overlap a kept one too much
export function selectSpans(
    spans: SiteSpan[],
    maxOverlap: number = CONFIG.ULTRA_PERMISSIVE.MAX_OVERLAP,
    limit: number = CONFIG.ULTRA_PERMISSIVE.MAX_CANDIDATES
): SiteSpan[] {
    const kept: SiteSpan[] = [];
    for (const span of rankSpans(spans)) {
        if (kept.length >= limit) break;
        if (kept.every(other => overlapFraction(other, span) <= maxOverlap)) {
            kept.push(span);
        }
    }
    return kept;
}
