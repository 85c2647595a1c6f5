import { describe, expect, it } from 'vitest';
import {
	compactError,
	extractLcscIds,
	formatFailureDetails,
	isLcscId,
	normalizeLcscId,
	sanitizeFileName,
	sanitizeName,
} from '../../../src/exporter/utils';

describe('names', () => {
	it('replaces characters outside word, dot and dash', () => {
		expect(sanitizeName('SOT-23 (5)/A.b')).toBe('SOT-23__5__A.b');
	});

	it('strips leading underscores from file names', () => {
		expect(sanitizeFileName('  LED 0603')).toBe('LED_0603');
		expect(sanitizeFileName('???')).toBe('export');
		expect(sanitizeFileName('x'.repeat(200))).toHaveLength(180);
	});
});

describe('LCSC ids', () => {
	it('recognizes part numbers', () => {
		expect(isLcscId(' c2040 ')).toBe(true);
		expect(isLcscId('C')).toBe(false);
		expect(isLcscId('X2040')).toBe(false);
		expect(isLcscId(undefined)).toBe(false);
		expect(normalizeLcscId(' c2040 ')).toBe('C2040');
	});

	it('extracts unique ids from free text', () => {
		expect(extractLcscIds('c2040, C8734 and C2040; not AC123')).toEqual(['C2040', 'C8734']);
	});
});

describe('errors', () => {
	it('keeps the first message line', () => {
		expect(compactError(new Error('first\nsecond'))).toBe('first');
		expect(compactError('plain failure')).toBe('plain failure');
	});

	it('numbers at most five failures', () => {
		expect(formatFailureDetails([])).toBe('');
		expect(formatFailureDetails(['a', 'b', 'c', 'd', 'e', 'f', 'g'])).toBe('1. a\n2. b\n3. c\n4. d\n5. e\n...and 2 more');
	});
});
