import { describe, expect, it } from 'vitest';

import {
    compareCodeUnits,
    flattenMessageText,
    normaliseWord,
    tokeniseOnSpaces,
    toMessageText
} from './text.utils';

describe('toMessageText', () => {
    it('keeps a bare string as plain text', () => {
        expect(toMessageText('hello')).toEqual({ kind: 'plain', value: 'hello' });
    });

    it('collects strings and entity texts from rich text', () => {
        expect(
            toMessageText(['Read ', { type: 'bold', text: 'Dune' }, ' next', 7, { type: 'custom' }])
        ).toEqual({ kind: 'rich', segments: ['Read ', 'Dune', ' next'] });
    });

    it.each([undefined, null, 42, true, { text: 'lonely' }])('treats %j as no text', (raw) => {
        expect(toMessageText(raw)).toEqual({ kind: 'empty' });
    });
});

describe('flattenMessageText', () => {
    it('returns the plain value', () => {
        expect(flattenMessageText({ kind: 'plain', value: 'hi there' })).toBe('hi there');
    });

    it('joins rich segments without separators', () => {
        expect(flattenMessageText({ kind: 'rich', segments: ['see ', 'https://example.test', '!'] })).toBe(
            'see https://example.test!'
        );
    });

    it('returns an empty string for no text', () => {
        expect(flattenMessageText({ kind: 'empty' })).toBe('');
    });
});

describe('tokeniseOnSpaces', () => {
    it('splits on single spaces', () => {
        expect(tokeniseOnSpaces('hi there')).toEqual(['hi', 'there']);
    });

    it('keeps the empty words between repeated spaces', () => {
        expect(tokeniseOnSpaces('there  we')).toEqual(['there', '', 'we']);
        expect(tokeniseOnSpaces(' hi')).toEqual(['', 'hi']);
    });

    it('does not split on other whitespace', () => {
        expect(tokeniseOnSpaces('one\ttwo\nthree')).toEqual(['one\ttwo\nthree']);
    });

    it('yields nothing for empty text', () => {
        expect(tokeniseOnSpaces('')).toEqual([]);
    });
});

describe('normaliseWord', () => {
    it('lowercases', () => {
        expect(normaliseWord('HeLLo')).toBe('hello');
        expect(normaliseWord('ÉCOLE')).toBe('école');
    });
});

describe('compareCodeUnits', () => {
    it('orders by code unit', () => {
        expect(['b', '', 'B', 'a'].sort(compareCodeUnits)).toEqual(['', 'B', 'a', 'b']);
    });
});
