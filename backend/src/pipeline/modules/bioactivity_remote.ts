import { CONFIG } from '../../config';
import type { IBioactivityOracle } from '../../interfaces';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

// Remote peptide-ranking service: POST {sequence} -> {score: 0..1}
export class RemoteBioactivityOracle implements IBioactivityOracle {
    constructor(
        private readonly url: string = CONFIG.BIOACTIVITY.API_URL,
        private readonly timeoutMs: number = CONFIG.BIOACTIVITY.TIMEOUT_MS
    ) { }

    public async predict(sequence: string): Promise<number | null> {
        if (sequence.length < 2) return null;

        try {
            const response = await fetch(this.url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ sequence }),
                signal: AbortSignal.timeout(this.timeoutMs)
            });

            if (response.status !== 200) {
                console.warn(`[Bioactivity] Remote scorer answered ${response.status}`);
                return null;
            }

            const data: unknown = await response.json();
            const score = isRecord(data) ? data.score : undefined;
            if (typeof score !== 'number' || !Number.isFinite(score)) {
                console.warn('[Bioactivity] Remote scorer returned no numeric score');
                return null;
            }
            return score * 100;
        } catch (error) {
            if (error instanceof Error && error.name === 'TimeoutError') {
                console.warn(`[Bioactivity] Remote scorer timed out after ${this.timeoutMs} ms`);
            } else {
                console.warn('[Bioactivity] Remote scorer unavailable:', error);
            }
            return null;
        }
    }
}
