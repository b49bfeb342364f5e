// UniProt protein resolver - reviewed, secreted human entries over the REST API

import { type } from 'arktype';
import { CONFIG } from '../config';
import type { IProteinCache, IProteinResolver } from '../interfaces';
import type { AnalysisParameters, AnnotatedPeptide, ProteinRecord, ProteinSearchType, ProteinSummary } from '../types';

const FIELDS = 'accession,gene_names,protein_name,sequence,length,ft_signal,ft_peptide,ft_propep';

const PositionSchema = type({ 'value?': 'number | null' });

const FeatureSchema = type({
    type: 'string',
    'description?': 'string',
    'location?': { 'start?': PositionSchema, 'end?': PositionSchema }
});

const EntrySchema = type({
    primaryAccession: 'string>0',
    sequence: { value: 'string>0', 'length?': 'number' },
    'genes?': type({ 'geneName?': { value: 'string' } }).array(),
    'proteinDescription?': { 'recommendedName?': { 'fullName?': { value: 'string' } } },
    'features?': FeatureSchema.array()
});

const SearchResultsSchema = type({ 'results?': 'unknown[]' });

export function calculateRecommendedParams(length: number, signalEnd: number, numPeptides: number): AnalysisParameters {
    const estimatedSites = numPeptides * 1.5;

    let minCleavageSites = 2;
    if (estimatedSites > 12) minCleavageSites = 5;
    else if (estimatedSites > 8) minCleavageSites = 4;
    else if (estimatedSites > 5) minCleavageSites = 3;

    let minCleavageSpacing = 5;
    if (length < 150) minCleavageSpacing = 3;
    else if (length < 300) minCleavageSpacing = 4;

    return {
        signalPeptideLength: signalEnd,
        minCleavageSites,
        minCleavageSpacing,
        maxPeptideLength: CONFIG.DEFAULTS.MAX_PEPTIDE_LENGTH
    };
}

/** Standardised record from one UniProt JSON entry, or null when it lacks an accession or sequence. */
export function parseProteinEntry(data: unknown): ProteinRecord | null {
    const entry = EntrySchema(data);
    if (entry instanceof type.errors) return null;

    const accession = entry.primaryAccession;
    const sequence = entry.sequence.value;
    const geneName = entry.genes?.[0]?.geneName?.value;
    const proteinName = entry.proteinDescription?.recommendedName?.fullName?.value ?? 'Unknown protein';
    const length = entry.sequence.length ?? sequence.length;

    const features = entry.features ?? [];
    const signal = features.find(feature => feature.type === 'Signal');
    const signalPeptideEnd = signal?.location?.end?.value ?? CONFIG.DEFAULTS.SIGNAL_PEPTIDE_LENGTH;

    const annotatedPeptides: AnnotatedPeptide[] = [];
    for (const feature of features) {
        if (feature.type !== 'Peptide' && feature.type !== 'Propeptide') continue;

        const start = feature.location?.start?.value ?? 0;
        const end = feature.location?.end?.value ?? 0;
        if (start > 0 && end > 0 && start <= sequence.length) {
            annotatedPeptides.push({
                name: feature.description || feature.type,
                start,
                end,
                sequence: sequence.slice(start - 1, end)
            });
        }
    }

    return {
        accession,
        geneName: geneName ?? 'Unknown',
        proteinName,
        length,
        sequence,
        signalPeptideEnd,
        recommendedParams: calculateRecommendedParams(length, signalPeptideEnd, annotatedPeptides.length),
        fastaHeader: `>sp|${accession}|${geneName ?? 'UNKN'}_HUMAN ${proteinName}`,
        annotatedPeptides
    };
}

export function toSummary(protein: ProteinRecord): ProteinSummary {
    return {
        accession: protein.accession,
        geneName: protein.geneName,
        proteinName: protein.proteinName,
        length: protein.length,
        signalPeptideEnd: protein.signalPeptideEnd,
        fastaHeader: protein.fastaHeader
    };
}

export class UniProtResolver implements IProteinResolver {
    constructor(
        private readonly cache: IProteinCache,
        private readonly baseUrl: string = CONFIG.UNIPROT.BASE_URL,
        private readonly timeoutMs: number = CONFIG.UNIPROT.TIMEOUT_MS
    ) { }

    public async getProtein(accession: string): Promise<ProteinRecord | null> {
        const id = accession.trim().toUpperCase();
        const cacheKey = `protein_${id}`;
        const cached = await this.cache.get<ProteinRecord>(cacheKey);
        if (cached) return cached;

        console.log(`[UniProt] Fetching protein ${id}`);
        const entry = await this.fetchJson(`${this.baseUrl}/${encodeURIComponent(id)}`, { format: 'json', fields: FIELDS });
        if (entry === null) {
            console.warn(`[UniProt] Protein not found: ${id}`);
            return null;
        }

        const protein = parseProteinEntry(entry);
        if (protein) await this.cache.set(cacheKey, protein);
        return protein;
    }

    public async searchProteins(query: string, searchType: ProteinSearchType, limit: number): Promise<ProteinSummary[]> {
        const cacheKey = `search_${searchType}_${query.toLowerCase()}_${limit}`;
        const cached = await this.cache.get<ProteinSummary[]>(cacheKey);
        if (cached) return cached;

        const field = searchType === 'accession' ? 'accession' : 'gene';
        const uniprotQuery = `(${field}:${query.toUpperCase()}) AND (organism_id:9606) AND (reviewed:true) AND (cc_subcellular_location:Secreted)`;
        console.log(`[UniProt] Search: ${uniprotQuery}`);

        const data = await this.fetchJson(`${this.baseUrl}/search`, {
            query: uniprotQuery,
            format: 'json',
            size: String(limit),
            fields: FIELDS
        });
        if (data === null) return [];

        const page = SearchResultsSchema(data);
        if (page instanceof type.errors) {
            console.warn(`[UniProt] Unexpected search answer: ${page.summary}`);
            return [];
        }

        const proteins: ProteinSummary[] = [];
        for (const entry of page.results ?? []) {
            const protein = parseProteinEntry(entry);
            if (protein) proteins.push(toSummary(protein));
        }

        await this.cache.set(cacheKey, proteins);
        return proteins;
    }

    // null on any non-200 answer, timeout or transport failure
    private async fetchJson(url: string, params: Record<string, string>): Promise<unknown> {
        const target = `${url}?${new URLSearchParams(params).toString()}`;
        try {
            const response = await fetch(target, { signal: AbortSignal.timeout(this.timeoutMs) });
            if (response.status !== 200) {
                console.warn(`[UniProt] ${response.status} for ${target}`);
                return null;
            }
            const body: unknown = await response.json();
            return body;
        } catch (error) {
            console.error('[UniProt] Request failed:', error);
            return null;
        }
    }
}
