import { CONFIG } from '../../config';
import { AnalysisInputError } from '../../errors';

export interface FastaRecord {
    sequence: string;
    header: string | null;
    id: string | null;
    name: string | null;
}

const FASTA_HEADER = /^(?:\w+\|)?([A-Z0-9]+)\|?([A-Z0-9_]+)?\s*(.*)?$/;

export class SequenceValidator {
    private readonly alphabet = new Set(CONFIG.VALID_AMINO_ACIDS);

    // Raw text or FASTA -> bare upper-case residues
    public cleanSequence(raw: string): string {
        let clean = raw.trim().toUpperCase();
        if (clean.startsWith('>')) {
            clean = clean.split('\n').slice(1).join('');
        }
        return clean.replace(/\s/g, '');
    }

    public parseFasta(text: string): FastaRecord {
        let header: string | null = null;
        let id: string | null = null;
        let name: string | null = null;
        const sequenceLines: string[] = [];

        for (const rawLine of text.trim().split('\n')) {
            const line = rawLine.trim();
            if (!line) continue;

            if (line.startsWith('>')) {
                header = line.slice(1).trim();
                const match = FASTA_HEADER.exec(header);
                if (match) {
                    id = match[1] || match[2] || null;
                    name = match[3] ? match[3].trim() : null;
                } else {
                    name = header;
                }
            } else {
                sequenceLines.push(line);
            }
        }

        return {
            sequence: sequenceLines.join('').replace(/\s/g, '').toUpperCase(),
            header,
            id,
            name
        };
    }

    public validateCharacters(sequence: string): void {
        const invalid = new Set<string>();
        for (const aa of sequence) {
            if (!this.alphabet.has(aa)) invalid.add(aa);
        }
        if (invalid.size > 0) {
            throw new AnalysisInputError(`Invalid characters: ${[...invalid].sort().join(', ')}`);
        }
    }

    public validateLength(sequence: string, minLength: number): void {
        if (sequence.length < minLength) {
            throw new AnalysisInputError(
                `Sequence too short. Min: ${minLength} aa (actual: ${sequence.length} aa)`
            );
        }
    }

    /** Clean, then check alphabet and the signal + 10 length floor. */
    public prepare(raw: string, signalLength: number): string {
        const clean = this.cleanSequence(raw);
        this.validateCharacters(clean);
        this.validateLength(clean, signalLength + 10);
        return clean;
    }
}
