import type { CleavageSite, PeptideCandidate, ProteinRecord, ProteinSearchType, ProteinSummary } from './types';

export interface SiteScanOptions {
    signalLength: number;
    minSpacing: number;
}

export interface ExtractOptions extends SiteScanOptions {
    minSites: number;
}

/** One detection mode: how it finds sites and how it slices the sequence with them. */
export interface IModeStrategy {
    findSites(sequence: string, options: SiteScanOptions): CleavageSite[];
    extract(sequence: string, sites: CleavageSite[], options: ExtractOptions): PeptideCandidate[];
}

export interface ScoringContext {
    cleavageMotif?: string;
    fullSequence?: string;
    /** Zero-based exclusive end of the candidate in fullSequence. */
    end?: number;
}

export interface BioactivityScore {
    score: number;
    source: 'remote' | 'heuristic';
}

export interface IBioactivityOracle {
    /** Resolves to a 0-100 score, or null when the oracle could not answer. */
    predict(sequence: string): Promise<number | null>;
}

export interface IProteinResolver {
    getProtein(accession: string): Promise<ProteinRecord | null>;
    searchProteins(query: string, type: ProteinSearchType, limit: number): Promise<ProteinSummary[]>;
}

/** Key/value store whose entries expire after a freshness window. */
export interface IProteinCache {
    get<T>(key: string): Promise<T | undefined>;
    set<T>(key: string, value: T): Promise<void>;
}
