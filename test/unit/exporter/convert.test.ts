import { describe, expect, it } from 'vitest';
import { FetchError } from '../../../src/core/errors';
import { buildComponentData, getHeadNumber, lcscNumberOf, parseCadData } from '../../../src/exporter/convert';
import { extractHeadAndShape } from '../../../src/exporter/librarySource';
import { BODY_RECT, makeCadData, ORIGIN_PAD, VCC_PIN } from '../../fixtures/cadData';

describe('parseCadData', () => {
	it('accepts the components payload', () => {
		const parsed = parseCadData(makeCadData());
		expect(parsed.title).toBe('TestPart');
		expect(lcscNumberOf(parsed)).toBe('C1234');
	});

	it('reads a bare numeric part number as text', () => {
		expect(lcscNumberOf(parseCadData({ lcsc: 1234 }))).toBe('1234');
	});

	it('names the offending field', () => {
		expect(() => parseCadData({ title: 42 })).toThrow(FetchError);
		expect(() => parseCadData({ title: 42 })).toThrow('Malformed CAD data at title');
	});

	it('rejects non-objects', () => {
		expect(() => parseCadData('nope')).toThrow('Malformed CAD data at <root>');
	});
});

describe('extractHeadAndShape', () => {
	it('reads a JSON string document', () => {
		const source = JSON.stringify({ head: { x: 1 }, shape: [VCC_PIN] });
		expect(extractHeadAndShape(source)).toEqual({ head: { x: 1 }, shape: [VCC_PIN] });
	});

	it('splits a newline-separated shape string', () => {
		expect(extractHeadAndShape({ head: {}, shape: `${VCC_PIN}\n\n${BODY_RECT}` }).shape).toEqual([VCC_PIN, BODY_RECT]);
	});

	it('fails on text that is not JSON', () => {
		expect(() => extractHeadAndShape('garbage')).toThrow('Document source is not valid JSON');
	});
});

describe('getHeadNumber', () => {
	it('falls back to originX and originY', () => {
		expect(getHeadNumber({ originX: '12.5' }, 'x')).toBe(12.5);
		expect(getHeadNumber({}, 'y')).toBe(0);
	});
});

describe('buildComponentData', () => {
	it('collects the component info and both sections', () => {
		const data = buildComponentData(parseCadData(makeCadData()));
		expect(data.info).toMatchObject({
			name: 'TestPart',
			prefix: 'U?',
			package: 'SOT-23-5',
			lcscId: 'C1234',
			manufacturer: 'Acme',
			description: 'Test regulator',
			datasheet: 'https://example.com/C1234',
		});
		expect(data.symbol).toEqual({ origin: { x: 0, y: 0 }, shape: [VCC_PIN, BODY_RECT] });
		expect(data.footprint).toMatchObject({ name: 'SOT-23-5', isSurfaceMount: true, origin: { x: 4000, y: 3000 } });
		expect(data.footprint?.shape[0]).toBe(ORIGIN_PAD);
	});

	it('treats an unreadable dataStr as absent', () => {
		const cadData = { ...makeCadData(), dataStr: 'garbage' };
		const data = buildComponentData(parseCadData(cadData));
		expect(data.symbol).toBeUndefined();
		expect(data.footprint).toBeDefined();
		expect(data.info.name).toBe('TestPart');
	});

	it('leaves out a missing footprint', () => {
		const data = buildComponentData(parseCadData(makeCadData({ withFootprint: false })));
		expect(data.footprint).toBeUndefined();
		expect(data.info.package).toBe('SOT-23-5');
	});

	it('uses the fallback name when nothing else names the part', () => {
		const data = buildComponentData(parseCadData({}), { fallbackName: 'C99' });
		expect(data.info.name).toBe('C99');
		expect(data.info.prefix).toBe('U');
		expect(data.info.package).toBe('C99_Footprint');
	});
});
