import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RemoteBioactivityOracle } from './bioactivity_remote';

const SCORER_URL = 'http://scorer.test/predict';

describe('RemoteBioactivityOracle', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('posts the sequence and scales the 0-1 answer', async () => {
        const fetchMock = vi.fn(async () => new Response(JSON.stringify({ score: 0.5 }), { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);

        const oracle = new RemoteBioactivityOracle(SCORER_URL, 1000);
        expect(await oracle.predict('AAAAAAAAAA')).toBe(50);

        expect(fetchMock).toHaveBeenCalledOnce();
        expect(fetchMock).toHaveBeenCalledWith(SCORER_URL, expect.objectContaining({
            method: 'POST',
            body: JSON.stringify({ sequence: 'AAAAAAAAAA' })
        }));
    });

    it('does not call out for sequences shorter than two residues', async () => {
        const fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);

        expect(await new RemoteBioactivityOracle(SCORER_URL, 1000).predict('A')).toBeNull();
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('answers null on a non-200 status', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('busy', { status: 503 })));
        expect(await new RemoteBioactivityOracle(SCORER_URL, 1000).predict('AAAAAAAAAA')).toBeNull();
    });

    it('answers null when the body carries no numeric score', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ score: 'high' }), { status: 200 })));
        expect(await new RemoteBioactivityOracle(SCORER_URL, 1000).predict('AAAAAAAAAA')).toBeNull();
    });

    it('answers null on a timeout', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => {
            throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
        }));
        expect(await new RemoteBioactivityOracle(SCORER_URL, 1000).predict('AAAAAAAAAA')).toBeNull();
    });

    it('answers null when the service is unreachable', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => {
            throw new TypeError('fetch failed');
        }));
        expect(await new RemoteBioactivityOracle(SCORER_URL, 1000).predict('AAAAAAAAAA')).toBeNull();
    });
});
