import {
    lotCodeCandidates,
    lotCodesMatch,
    normalizeLotCode,
} from '../lotCodes.js';

describe('normalizeLotCode', () => {
    it('trims and upper-cases', () => {
        expect(normalizeLotCode('  l28553 ')).toBe('L28553');
    });
});

describe('lotCodesMatch', () => {
    it('ignores case and surrounding whitespace', () => {
        expect(lotCodesMatch('l28553 ', 'L28553')).toBe(true);
        expect(lotCodesMatch('L28553', 'L28554')).toBe(false);
    });
});

describe('lotCodeCandidates', () => {
    it('yields only the normalized code when no fallback applies', () => {
        expect([...lotCodeCandidates(' l28553 ')]).toEqual(['L28553']);
    });

    it('adds the lot prefix to an all-digit code', () => {
        expect([...lotCodeCandidates('28553')]).toEqual(['28553', 'L28553']);
    });

    it('chains fallbacks in order', () => {
        expect([...lotCodeCandidates('l-028553')]).toEqual(['L-028553', 'L028553', 'L28553']);
        expect([...lotCodeCandidates('00123')]).toEqual(['00123', 'L00123', 'L123']);
    });

    it('yields nothing for a blank code', () => {
        expect([...lotCodeCandidates('   ')]).toEqual([]);
    });

    it('respects the candidate bound', () => {
        expect([...lotCodeCandidates('00123', 2)]).toEqual(['00123', 'L00123']);
        expect([...lotCodeCandidates('00123', 0)]).toEqual([]);
    });

    it('produces the exact code before computing any fallback', () => {
        const iterator = lotCodeCandidates('28553');
        expect(iterator.next()).toEqual({ value: '28553', done: false });
        expect(iterator.next()).toEqual({ value: 'L28553', done: false });
        expect(iterator.next()).toEqual({ value: undefined, done: true });
    });
});
