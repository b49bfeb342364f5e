// Type definitions for the convertase peptide predictor

export const DETECTION_MODES = ['strict', 'permissive', 'ultra-permissive', 'four-residue-motif'] as const;

export type DetectionMode = typeof DETECTION_MODES[number];

export function isDetectionMode(value: unknown): value is DetectionMode {
    return DETECTION_MODES.some(mode => mode === value);
}

export interface CleavageSite {
    /** Offset just past the motif, i.e. the cleavage point. */
    position: number;
    motif: string;
    /** Offset of the first motif residue. */
    index: number;
    /** Offset just past the RF/RY(G) motif, ultra-permissive amidation sites only. */
    amidationEnd?: number;
}

export type BioactivitySource = 'remote' | 'heuristic' | 'none';

export type PeptideType = 'mature_form' | 'prodomain';

export type UniprotStatus = 'exact' | 'partial' | 'unknown';

export interface AmphipathicMetrics {
    amphipathicScore: number;
    basicCount: number;
    lipophilicCount: number;
    basicRatio: number;
    lipophilicRatio: number;
    otherCount: number;
    otherRatio: number;
}

interface PtmBase {
    shortName: string;
    enzyme: string;
    description: string;
}

export interface AmidationPtm extends PtmBase {
    type: 'C-terminal amidation';
    motif: string;
    position: 'C-terminus';
}

export interface PyroglutamatePtm extends PtmBase {
    type: 'N-terminal pyroglutamate';
    residue: 'Q' | 'E';
    position: 1;
}

export interface DisulfidePtm extends PtmBase {
    type: 'Disulfide bonds';
    positions: number[];
    count: number;
}

export interface AcylationPtm extends PtmBase {
    type: 'N-terminal acylation';
    residue: 'Ser3';
    position: 3;
}

export interface SulfationPtm extends PtmBase {
    type: 'Tyrosine O-sulfation';
    residue: string;
    position: number;
}

export interface GlycosylationPtm extends PtmBase {
    type: 'N-glycosylation';
    motif: string;
    position: number;
}

export type PtmAnnotation =
    | AmidationPtm
    | PyroglutamatePtm
    | DisulfidePtm
    | AcylationPtm
    | SulfationPtm
    | GlycosylationPtm;

export interface PeptideCandidate {
    sequence: string;
    /** Zero-based offset into the parent sequence. */
    start: number;
    /** Zero-based exclusive end offset. */
    end: number;
    length: number;
    inRange: boolean;
    cleavageMotifN: string;
    cleavageMotifC: string;
    bioactivityScore: number;
    bioactivitySource: BioactivitySource;
    ptms: PtmAnnotation[];
    modifiedSequence?: string;
    confidence?: number;
    peptideType?: PeptideType;
    amphipathic?: AmphipathicMetrics;
    uniprotStatus?: UniprotStatus;
    uniprotName?: string;
    uniprotNote?: string;
    uniprotAccession?: string;
}

/** A candidate as reported to callers: one-based, inclusive positions. */
export interface PeptideReport extends Omit<PeptideCandidate, 'start' | 'end'> {
    start: number;
    end: number;
}

export interface AnalysisParameters {
    signalPeptideLength: number;
    minCleavageSites: number;
    minCleavageSpacing: number;
    maxPeptideLength: number;
}

export interface AnalysisRequest extends Partial<AnalysisParameters> {
    sequence: string;
    mode?: DetectionMode;
}

/** Header of a FASTA-formatted input, without the leading '>'. */
export interface FastaHeader {
    header: string;
    id: string | null;
    name: string | null;
}

export interface AnalysisResult {
    sequenceLength: number;
    cleavageSitesCount: number;
    cleavageSites: CleavageSite[];
    peptides: PeptideReport[];
    peptidesInRange: number;
    topPeptides: PeptideReport[];
    mode: DetectionMode;
    parameters: AnalysisParameters;
    fasta?: FastaHeader;
}

export interface AnnotatedPeptide {
    name: string;
    start: number;
    end: number;
    sequence: string;
}

export interface ProteinRecord {
    accession: string;
    geneName: string;
    proteinName: string;
    length: number;
    sequence: string;
    signalPeptideEnd: number;
    recommendedParams: AnalysisParameters;
    fastaHeader: string;
    annotatedPeptides: AnnotatedPeptide[];
}

export type ProteinSummary = Omit<ProteinRecord, 'sequence' | 'recommendedParams' | 'annotatedPeptides'>;

export type ProteinSearchType = 'gene_name' | 'accession';

export interface ProteinAnalysisSuccess extends AnalysisResult {
    status: 'success';
    analysisId: string;
    proteinId: string;
    geneName: string;
    proteinName: string;
    accession: string;
    fastaHeader: string;
    signalPeptideEnd: number;
}

export interface ProteinAnalysisFailure {
    status: 'error';
    analysisId: string;
    proteinId: string;
    error: string;
}

export type ProteinAnalysis = ProteinAnalysisSuccess | ProteinAnalysisFailure;

export interface BatchResult {
    totalProteins: number;
    uniqueProteins: number;
    successfulProteins: number;
    failedProteins: number;
    results: ProteinAnalysis[];
    notFound: string[];
    mode: DetectionMode;
}
