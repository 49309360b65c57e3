import { describe, expect, it } from 'vitest';
import { formatSize, shellQuote } from './format';

describe('formatSize', () => {
    it('formats each unit', () => {
        expect(formatSize(500)).toBe('500.0 B');
        expect(formatSize(1024)).toBe('1.0 KB');
        expect(formatSize(1024 * 1024)).toBe('1.0 MB');
        expect(formatSize(1024 * 1024 * 1024)).toBe('1.0 GB');
        expect(formatSize(1536)).toBe('1.5 KB');
        expect(formatSize(1024 ** 5)).toBe('1.0 PB');
    });
});

describe('shellQuote', () => {
    it('wraps in single quotes', () => {
        expect(shellQuote('/data/2023-03-03 Moggs in the dark/insta360')).toBe(`'/data/2023-03-03 Moggs in the dark/insta360'`);
    });

    it('escapes embedded single quotes and leaves $ alone', () => {
        expect(shellQuote(`/data/Sam's $HOME`)).toBe(`'/data/Sam'\\''s $HOME'`);
    });
});
