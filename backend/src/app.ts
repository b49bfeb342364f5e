import express from 'express';
import type { Response } from 'express';
import cors from 'cors';
import { type } from 'arktype';
import type { ArkErrors } from 'arktype';
import { CONFIG } from './config';
import { AnalysisInputError, ProteinNotFoundError } from './errors';
import type { IProteinResolver } from './interfaces';
import { DEFAULT_PARAMETERS, PeptideAnalyzer } from './pipeline/analyzer';
import { DETECTION_MODES } from './types';
import type { ProteinSearchType } from './types';

const ModeSchema = type.enumerated(...DETECTION_MODES);

const AnalyzeBodySchema = type({
    'sequence?': 'string',
    'proteinId?': 'string',
    'mode?': ModeSchema,
    'signalPeptideLength?': 'number',
    'minCleavageSites?': 'number',
    'minCleavageSpacing?': 'number',
    'maxPeptideLength?': 'number'
});

const BatchBodySchema = type({
    proteinIds: 'string[]',
    'mode?': ModeSchema
});

// Message per offending top-level key; an empty path means the body itself
const SCHEMA_MESSAGES: Record<string, string> = {
    '': 'Request body must be a JSON object',
    mode: `mode must be one of: ${DETECTION_MODES.join(', ')}`,
    sequence: 'sequence must be a string',
    proteinId: 'proteinId must be a string',
    proteinIds: 'proteinIds must be a non-empty array of strings',
    signalPeptideLength: 'signalPeptideLength must be a number',
    minCleavageSites: 'minCleavageSites must be a number',
    minCleavageSpacing: 'minCleavageSpacing must be a number',
    maxPeptideLength: 'maxPeptideLength must be a number'
};

function toInputError(errors: ArkErrors): AnalysisInputError {
    const key = errors[0] ? String(errors[0].path[0] ?? '') : '';
    return new AnalysisInputError(SCHEMA_MESSAGES[key] ?? errors.summary);
}

function sendError(res: Response, error: unknown) {
    if (error instanceof AnalysisInputError || error instanceof ProteinNotFoundError) {
        res.status(error.statusCode).json({ error: error.message });
        return;
    }
    console.error('[API] Internal error:', error);
    res.status(500).json({ error: `Internal error: ${error instanceof Error ? error.message : String(error)}` });
}

export function createApp(analyzer: PeptideAnalyzer, resolver: IProteinResolver | null = null) {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // --- API Endpoints ---

    app.get('/', (req, res) => {
        res.json({
            message: `${CONFIG.API_TITLE} v${CONFIG.API_VERSION}`,
            version: CONFIG.API_VERSION,
            endpoints: {
                analyze: 'POST /analyze',
                batch: 'POST /analyze/batch',
                search: 'GET /proteins/search',
                protein: 'GET /proteins/:accession',
                health: 'GET /health',
                stats: 'GET /stats'
            }
        });
    });

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: CONFIG.API_VERSION,
            remoteScorerConfigured: CONFIG.BIOACTIVITY.API_URL !== '',
            proteinLookupAvailable: resolver !== null
        });
    });

    app.get('/stats', (req, res) => {
        res.json({
            api: CONFIG.API_TITLE,
            version: CONFIG.API_VERSION,
            modes: {
                'strict': 'Dibasic motifs, not after a basic residue, spaced apart',
                'permissive': 'Every dibasic motif',
                'ultra-permissive': 'Single basic residues with RF/RY-amide priority',
                'four-residue-motif': 'R-X-(K/R)-R, mature form and prodomain'
            },
            bioactivity: {
                primary: 'Remote scorer (per peptide, in parallel)',
                fallback: 'Heuristic scoring'
            },
            defaultParams: DEFAULT_PARAMETERS,
            optimalRange: `${CONFIG.RANGES.DIBASIC.MIN}-${CONFIG.RANGES.DIBASIC.MAX} aa`
        });
    });

    app.post('/analyze', async (req, res) => {
        try {
            const body = AnalyzeBodySchema(req.body);
            if (body instanceof type.errors) throw toInputError(body);

            const mode = body.mode ?? 'strict';
            const overrides = {
                signalPeptideLength: body.signalPeptideLength,
                minCleavageSites: body.minCleavageSites,
                minCleavageSpacing: body.minCleavageSpacing,
                maxPeptideLength: body.maxPeptideLength
            };

            if (body.proteinId !== undefined && body.proteinId.trim() !== '') {
                res.json(await analyzer.runProtein(body.proteinId.trim(), mode, overrides));
                return;
            }
            if (body.sequence === undefined) {
                throw new AnalysisInputError('Either sequence or proteinId is required');
            }
            res.json(await analyzer.analyzeSequence({ sequence: body.sequence, mode, ...overrides }));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.post('/analyze/batch', async (req, res) => {
        try {
            const body = BatchBodySchema(req.body);
            if (body instanceof type.errors) throw toInputError(body);
            if (body.proteinIds.length === 0) {
                throw new AnalysisInputError(SCHEMA_MESSAGES.proteinIds);
            }
            res.json(await analyzer.analyzeBatch(body.proteinIds, body.mode ?? 'strict'));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/proteins/search', async (req, res) => {
        try {
            if (!resolver) throw new ProteinNotFoundError(String(req.query.q ?? ''));
            const q = typeof req.query.q === 'string' ? req.query.q.trim() : '';
            if (q.length < 2) throw new AnalysisInputError('q must be at least 2 characters');

            const searchType: ProteinSearchType = req.query.type === 'accession' ? 'accession' : 'gene_name';
            const limit = Math.min(20, Math.max(1, Number(req.query.limit) || 10));
            res.json(await resolver.searchProteins(q, searchType, limit));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/proteins/:accession', async (req, res) => {
        try {
            const protein = resolver ? await resolver.getProtein(req.params.accession) : null;
            if (!protein) throw new ProteinNotFoundError(req.params.accession);
            res.json(protein);
        } catch (e) {
            sendError(res, e);
        }
    });

    return app;
}
