import EventEmitter from 'events';
import { v4 as uuidv4 } from 'uuid';
import { CONFIG } from '../config';
import { AnalysisInputError, ProteinNotFoundError } from '../errors';
import type { BioactivityScore, IProteinResolver } from '../interfaces';
import { isDetectionMode } from '../types';
import type {
    AnalysisParameters,
    AnalysisRequest,
    AnalysisResult,
    BatchResult,
    DetectionMode,
    PeptideCandidate,
    PeptideReport,
    ProteinAnalysis,
    ProteinAnalysisFailure,
    ProteinAnalysisSuccess,
    ProteinRecord
} from '../types';
import { calculateAmphipathic } from './modules/amphipathic';
import { BioactivityScorer } from './modules/bioactivity';
import { CleavageDetector } from './modules/detector';
import { PeptideExtractor } from './modules/extractor';
import { Gatekeeper } from './modules/gatekeeper';
import { matchKnownPeptide } from './modules/knownPeptides';
import { PtmAnnotator } from './modules/ptm';
import { SequenceValidator } from './modules/validator';

export interface AnalyzerOptions {
    resolver?: IProteinResolver | null;
    scorer?: BioactivityScorer;
    validator?: SequenceValidator;
    detector?: CleavageDetector;
    extractor?: PeptideExtractor;
    annotator?: PtmAnnotator;
    batchPauseMs?: number;
}

export interface BatchProgress {
    proteinId: string;
    status: 'analyzing' | 'completed' | 'not_found' | 'error';
    index: number;
    total: number;
}

export const DEFAULT_PARAMETERS: AnalysisParameters = {
    signalPeptideLength: CONFIG.DEFAULTS.SIGNAL_PEPTIDE_LENGTH,
    minCleavageSites: CONFIG.DEFAULTS.MIN_CLEAVAGE_SITES,
    minCleavageSpacing: CONFIG.DEFAULTS.MIN_CLEAVAGE_SPACING,
    maxPeptideLength: CONFIG.DEFAULTS.MAX_PEPTIDE_LENGTH
};

// Bounds each parameter must respect
const PARAMETER_FLOORS: AnalysisParameters = {
    signalPeptideLength: 0,
    minCleavageSites: 1,
    minCleavageSpacing: 1,
    maxPeptideLength: 10
};

const PARAMETER_KEYS: ReadonlyArray<keyof AnalysisParameters> = [
    'signalPeptideLength',
    'minCleavageSites',
    'minCleavageSpacing',
    'maxPeptideLength'
];

export function resolveParameters(overrides: Partial<AnalysisParameters>, base: AnalysisParameters = DEFAULT_PARAMETERS): AnalysisParameters {
    const resolved: AnalysisParameters = { ...base };
    for (const key of PARAMETER_KEYS) {
        const value = overrides[key];
        if (value === undefined) continue;
        if (!Number.isInteger(value) || value < PARAMETER_FLOORS[key]) {
            throw new AnalysisInputError(`${key} must be an integer >= ${PARAMETER_FLOORS[key]}`);
        }
        resolved[key] = value;
    }
    return resolved;
}

/** Positions as callers see them: one-based start, inclusive end. */
export function toReport(candidate: PeptideCandidate): PeptideReport {
    return { ...candidate, start: candidate.start + 1, end: candidate.end };
}

/**
 * Runs validation, detection, extraction, scoring and PTM annotation for
 * one sequence, one resolved protein, or a batch of proteins. Emits `log`,
 * `status` and `progress` events.
 */
export class PeptideAnalyzer extends EventEmitter {
    private readonly resolver: IProteinResolver | null;
    private readonly scorer: BioactivityScorer;
    private readonly validator: SequenceValidator;
    private readonly detector: CleavageDetector;
    private readonly extractor: PeptideExtractor;
    private readonly annotator: PtmAnnotator;
    private readonly batchPauseMs: number;

    constructor(options: AnalyzerOptions = {}) {
        super();
        this.resolver = options.resolver ?? null;
        this.scorer = options.scorer ?? new BioactivityScorer();
        this.validator = options.validator ?? new SequenceValidator();
        this.detector = options.detector ?? new CleavageDetector();
        this.extractor = options.extractor ?? new PeptideExtractor();
        this.annotator = options.annotator ?? new PtmAnnotator();
        this.batchPauseMs = options.batchPauseMs ?? CONFIG.BATCH.PAUSE_MS;
    }

    public async analyzeSequence(request: AnalysisRequest, protein?: ProteinRecord): Promise<AnalysisResult> {
        const mode = request.mode ?? 'strict';
        if (!isDetectionMode(mode)) {
            throw new AnalysisInputError(`Unknown detection mode: ${String(mode)}`);
        }
        const parameters = resolveParameters(request);
        const { header, id, name } = this.validator.parseFasta(request.sequence);
        const sequence = this.validator.prepare(request.sequence, parameters.signalPeptideLength);

        const sites = this.detector.findSites(sequence, mode, parameters.signalPeptideLength, parameters.minCleavageSpacing);
        const extracted = this.extractor.extract(
            sequence,
            sites,
            parameters.signalPeptideLength,
            parameters.minCleavageSpacing,
            parameters.minCleavageSites,
            mode
        );
        const peptides = extracted.filter(peptide => peptide.length <= parameters.maxPeptideLength);
        this.emit('log', `${mode}: ${sites.length} site(s), ${extracted.length} peptide(s), ${peptides.length} within ${parameters.maxPeptideLength} aa`);

        const scores = await this.scorer.scoreBatch(peptides, sequence);
        const enriched = peptides.map((peptide, i) => this.enrich(peptide, scores[i], sequence, protein));

        const ranked = [...enriched].sort((a, b) => b.bioactivityScore - a.bioactivityScore);
        const reports = ranked.map(toReport);

        return {
            sequenceLength: sequence.length,
            cleavageSitesCount: sites.length,
            cleavageSites: sites,
            peptides: reports,
            peptidesInRange: reports.filter(peptide => peptide.inRange).length,
            topPeptides: reports.slice(0, CONFIG.BATCH.TOP_PEPTIDES),
            mode,
            parameters,
            ...(header !== null ? { fasta: { header, id, name } } : {})
        };
    }

    /** Resolves the protein and analyses it with its recommended parameters, overrides first. */
    public async runProtein(
        proteinId: string,
        mode: DetectionMode,
        overrides: Partial<AnalysisParameters> = {}
    ): Promise<ProteinAnalysisSuccess> {
        if (!this.resolver) {
            throw new ProteinNotFoundError(proteinId);
        }
        const protein = await this.resolver.getProtein(proteinId);
        if (!protein) {
            throw new ProteinNotFoundError(proteinId);
        }

        const parameters = resolveParameters(overrides, protein.recommendedParams);
        this.emit('log', `${protein.geneName} (${protein.accession}): signal=${parameters.signalPeptideLength}, sites=${parameters.minCleavageSites}, spacing=${parameters.minCleavageSpacing}`);

        const result = await this.analyzeSequence({ sequence: protein.sequence, mode, ...parameters }, protein);
        return {
            ...result,
            status: 'success',
            analysisId: uuidv4(),
            proteinId: protein.accession,
            geneName: protein.geneName,
            proteinName: protein.proteinName,
            accession: protein.accession,
            fastaHeader: protein.fastaHeader,
            signalPeptideEnd: protein.signalPeptideEnd
        };
    }

    public async analyzeBatch(proteinIds: string[], mode: DetectionMode): Promise<BatchResult> {
        const unique = new Gatekeeper().unique(proteinIds);
        if (unique.length < proteinIds.length) {
            this.emit('log', `Removed ${proteinIds.length - unique.length} duplicate id(s)`);
        }
        this.emit('status', `Batch started: ${unique.length} protein(s), mode ${mode}`);

        const results: ProteinAnalysis[] = [];
        const notFound: string[] = [];

        for (let i = 0; i < unique.length; i++) {
            const proteinId = unique[i];
            const progress = (status: BatchProgress['status']) =>
                this.emit('progress', { proteinId, status, index: i + 1, total: unique.length } satisfies BatchProgress);

            progress('analyzing');
            try {
                results.push(await this.runProtein(proteinId, mode));
                progress('completed');
            } catch (error) {
                if (error instanceof ProteinNotFoundError) {
                    notFound.push(proteinId);
                    progress('not_found');
                } else {
                    console.error(`[Analyzer] ${proteinId} failed:`, error);
                    results.push(this.failure(proteinId, error));
                    progress('error');
                }
            }

            if (this.batchPauseMs > 0 && i < unique.length - 1) {
                await new Promise(r => setTimeout(r, this.batchPauseMs));
            }
        }

        const successful = results.filter(result => result.status === 'success').length;
        this.emit('status', `Batch completed: ${successful} ok, ${results.length - successful} failed, ${notFound.length} not found`);

        return {
            totalProteins: proteinIds.length,
            uniqueProteins: unique.length,
            successfulProteins: successful,
            failedProteins: results.length - successful,
            results,
            notFound,
            mode
        };
    }

    private enrich(candidate: PeptideCandidate, score: BioactivityScore, fullSequence: string, protein?: ProteinRecord): PeptideCandidate {
        let enriched: PeptideCandidate = {
            ...candidate,
            bioactivityScore: score.score,
            bioactivitySource: score.source,
            amphipathic: calculateAmphipathic(candidate.sequence)
        };
        if (protein) {
            enriched = { ...enriched, ...matchKnownPeptide(candidate.sequence, protein.annotatedPeptides, protein.accession) };
        }
        return this.annotate(enriched, fullSequence);
    }

    // A malformed candidate or a detector fault costs that candidate its PTMs, nothing more
    private annotate(candidate: PeptideCandidate, fullSequence: string): PeptideCandidate {
        if (!Number.isInteger(candidate.start) || !Number.isInteger(candidate.end)) {
            return { ...candidate, ptms: [] };
        }
        try {
            const ptms = this.annotator.annotate(candidate.sequence, fullSequence, candidate.start, candidate.end);
            if (ptms.length === 0) return { ...candidate, ptms };
            return { ...candidate, ptms, modifiedSequence: this.annotator.generateModifiedSequence(candidate.sequence, ptms) };
        } catch (error) {
            console.error(`[PTM] Annotation failed for peptide at ${candidate.start + 1}:`, error);
            return { ...candidate, ptms: [] };
        }
    }

    private failure(proteinId: string, error: unknown): ProteinAnalysisFailure {
        return {
            status: 'error',
            analysisId: uuidv4(),
            proteinId,
            error: error instanceof Error ? error.message : String(error)
        };
    }
}
