import path from 'path';

function envNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
}

// Relative paths resolve against the working directory, absolute ones stay as given
export function resolveCachePath(override: string | undefined, cwd: string = process.cwd()): string {
    return path.resolve(cwd, override || 'protein_cache.db');
}

export const CONFIG = {
    API_TITLE: 'Convertase Peptide Predictor',
    API_VERSION: '0.1.0',
    PORT: envNumber('PORT', 8000),

    PATHS: {
        CACHE_DB: resolveCachePath(process.env.PEPTIDE_CACHE_DB)
    },

    // Defaults used when a request or a resolved protein does not say otherwise
    DEFAULTS: {
        SIGNAL_PEPTIDE_LENGTH: 20,
        MIN_CLEAVAGE_SITES: 4,
        MIN_CLEAVAGE_SPACING: 5,
        MAX_PEPTIDE_LENGTH: 100
    },

    // Typical product lengths, in residues
    RANGES: {
        DIBASIC: { MIN: 5, MAX: 25 },
        FOUR_RESIDUE: { MIN: 20, MAX: 150 }
    },

    VALID_AMINO_ACIDS: 'ACDEFGHIKLMNPQRSTVWY*',

    PATTERNS: {
        strict: '(?<![KR])(?:KK|KR|RR|RK)(?=[^RKILPVH]|$)',
        permissive: '(?:KK|KR|RR|RK)(?=[^RKILPVH]|$)',
        amidation: 'R[FY]G?',
        fourResidue: 'R[A-Z][KR]R'
    },

    ULTRA_PERMISSIVE: {
        LOOKBACK: 50,
        MIN_LENGTH: 4,
        MAX_LENGTH: 50,
        MIN_CONFIDENCE: 30,
        AMIDATION_FLOOR: 90,
        MAX_OVERLAP: 0.7,
        MAX_CANDIDATES: 50
    },

    FOUR_RESIDUE: {
        MIN_MATURE_LENGTH: 10,
        MIN_PRODOMAIN_LENGTH: 20
    },

    BIOACTIVITY: {
        // Empty disables the remote scorer
        API_URL: process.env.BIOACTIVITY_API_URL || '',
        TIMEOUT_MS: envNumber('BIOACTIVITY_TIMEOUT_MS', 10000)
    },

    UNIPROT: {
        BASE_URL: process.env.UNIPROT_BASE_URL || 'https://rest.uniprot.org/uniprotkb',
        TIMEOUT_MS: envNumber('UNIPROT_TIMEOUT_MS', 15000),
        CACHE_TTL_MS: 24 * 60 * 60 * 1000
    },

    BATCH: {
        PAUSE_MS: envNumber('BATCH_PAUSE_MS', 500),
        TOP_PEPTIDES: 5
    }
};
