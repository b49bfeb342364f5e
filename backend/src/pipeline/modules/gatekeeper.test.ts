import { describe, expect, it } from 'vitest';
import { Gatekeeper } from './gatekeeper';

describe('Gatekeeper', () => {
    it('keeps first occurrences in their original order and spelling', () => {
        expect(new Gatekeeper().unique(['P01189', 'q9ubu3', ' p01189', 'Q9UBU3', 'P10645'])).toEqual(['P01189', 'q9ubu3', 'P10645']);
    });

    it('remembers ids across calls', () => {
        const gate = new Gatekeeper();
        expect(gate.unique(['P01189'])).toEqual(['P01189']);
        expect(gate.unique([' p01189 ', 'P10645'])).toEqual(['P10645']);
    });
});
