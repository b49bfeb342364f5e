import { CONFIG } from '../../config';
import type { ExtractOptions, IModeStrategy, SiteScanOptions } from '../../interfaces';
import type { CleavageSite, PeptideCandidate } from '../../types';
import { buildCandidate, isBasic } from '../modules/candidate';
import { scoreConfidence, selectSpans } from '../modules/confidence';
import type { SiteSpan } from '../modules/confidence';

/**
 * Single-basic cleavage with RF/RY-amide priority.
 *
 * Sites: every RF, RFG, RY or RYG is tied to the nearest K/R before it (up to
 * 50 residues back), then every other K/R becomes a one-residue site.
 * Candidates: all site pairs, scored for confidence and thinned by overlap.
 */
export class UltraPermissiveMode implements IModeStrategy {
    public findSites(sequence: string, { signalLength }: SiteScanOptions): CleavageSite[] {
        const region = sequence.slice(signalLength);
        const amidationSites = this.findAmidationSites(region, signalLength);

        const consumed = new Set(amidationSites.map(site => site.index));
        const singleSites: CleavageSite[] = [];
        for (let i = 0; i < region.length; i++) {
            const absolute = signalLength + i;
            if (isBasic(region[i]) && !consumed.has(absolute)) {
                singleSites.push({ position: absolute + 1, motif: region[i], index: absolute });
            }
        }

        console.log(`[Detector] ultra-permissive scan on ${region.length} aa: ${amidationSites.length} amidation + ${singleSites.length} single basic`);

        // Array.prototype.sort is stable, so equal indices keep single-basic first
        return [...singleSites, ...amidationSites].sort((a, b) => a.index - b.index);
    }

    private findAmidationSites(region: string, signalLength: number): CleavageSite[] {
        const pattern = new RegExp(CONFIG.PATTERNS.amidation, 'g');
        const sites: CleavageSite[] = [];

        let match: RegExpExecArray | null;
        while ((match = pattern.exec(region)) !== null) {
            const motif = match[0];
            const rfStart = match.index;
            const amidationEnd = signalLength + rfStart + motif.length;

            let anchor = -1;
            const maxLookback = Math.min(CONFIG.ULTRA_PERMISSIVE.LOOKBACK, rfStart);
            for (let lookback = 1; lookback <= maxLookback; lookback++) {
                if (isBasic(region[rfStart - lookback])) {
                    anchor = rfStart - lookback;
                    break;
                }
            }

            if (anchor >= 0) {
                const index = signalLength + anchor;
                sites.push({ position: index + 1, motif: `${region[anchor]}...${motif}`, index, amidationEnd });
            } else {
                sites.push({ position: amidationEnd, motif: `START...${motif}`, index: signalLength + rfStart, amidationEnd });
            }
        }
        return sites;
    }

    public extract(sequence: string, sites: CleavageSite[], _options: ExtractOptions): PeptideCandidate[] {
        const { MIN_LENGTH, MAX_LENGTH, MIN_CONFIDENCE } = CONFIG.ULTRA_PERMISSIVE;
        const spans: SiteSpan[] = [];

        const consider = (from: number, to: number, start: number, end: number) => {
            const length = end - start;
            if (length < MIN_LENGTH || length > MAX_LENGTH) return;
            const confidence = scoreConfidence(sequence, sites, from, to, start, end);
            if (confidence < MIN_CONFIDENCE) return;
            spans.push({ from, to, start, end, confidence });
        };

        for (let from = 0; from < sites.length; from++) {
            const nSite = sites[from];
            if (nSite.amidationEnd !== undefined) {
                consider(from, from, nSite.position, nSite.amidationEnd);
            }
            for (let to = from + 1; to < sites.length; to++) {
                const cSite = sites[to];
                // Amidation motifs stay in the body so the active C-terminus is kept
                consider(from, to, nSite.position, cSite.amidationEnd ?? cSite.index);
            }
        }

        const selected = selectSpans(spans);
        console.log(`[Extractor] ultra-permissive: ${spans.length} scored pair(s), ${selected.length} kept`);

        return selected.map(span => ({
            ...buildCandidate(sequence, {
                start: span.start,
                end: span.end,
                cleavageMotifN: sites[span.from].motif,
                cleavageMotifC: sites[span.to].motif
            }),
            confidence: span.confidence
        }));
    }
}
