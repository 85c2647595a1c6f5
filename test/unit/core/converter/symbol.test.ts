import type { EasyEDAPath } from '../../../../src/core/types/easyeda';
import { describe, expect, it } from 'vitest';
import {
	applyPinNameStyle,
	pathToPolyline,
	pinLengthOf,
	quote,
	sanitizeSymbolId,
	SymbolConverter,
} from '../../../../src/core/converter/symbol';
import { MissingSectionError } from '../../../../src/core/errors';
import { BODY_RECT, makeComponent, VCC_PIN } from '../../../fixtures/cadData';

function path(d: string, fillColor = 'none'): EasyEDAPath {
	return { path: d, strokeColor: '#000000', strokeWidth: 1, strokeStyle: '0', fillColor, id: 'path1', locked: false };
}

describe('helpers', () => {
	it('derives record identifiers from names', () => {
		expect(sanitizeSymbolId('LM317 ADJ/TO-220')).toBe('LM317_ADJ_TO-220');
		expect(sanitizeSymbolId('A-B.C')).toBe('A-B.C');
	});

	it('escapes quoted strings', () => {
		expect(quote('a "b" \\c')).toBe('"a \\"b\\" \\\\c"');
	});

	it('marks active-low names with an overbar', () => {
		expect(applyPinNameStyle('RESET#')).toBe('~{RESET}');
		expect(applyPinNameStyle('CS/WR#')).toBe('CS/~{WR}');
		expect(applyPinNameStyle('VCC')).toBe('VCC');
	});

	it('reads the pin length after the last h', () => {
		expect(pinLengthOf('M0,0h-20')).toBe(20);
		expect(pinLengthOf('M 10 20 h 15')).toBe(15);
		expect(pinLengthOf('M 0 0')).toBe(10);
	});
});

describe('pathToPolyline', () => {
	it('converts absolute straight segments', () => {
		expect(pathToPolyline(path('M 0 0 L 10 0 L 10 10 Z'))).toEqual({
			points: [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }],
			closed: true,
		});
	});

	it('follows relative commands', () => {
		expect(pathToPolyline(path('M 5 5 h 10 v 10'))).toEqual({
			points: [{ x: 5, y: 5 }, { x: 15, y: 5 }, { x: 15, y: 15 }],
			closed: false,
		});
	});

	it('closes filled paths', () => {
		expect(pathToPolyline(path('M 0 0 L 10 0', '#FF0000'))?.closed).toBe(true);
	});

	it('gives up on curves', () => {
		expect(pathToPolyline(path('M 0 0 C 1 1 2 2 3 3'))).toBeUndefined();
	});
});

describe('SymbolConverter.build', () => {
	const converter = new SymbolConverter();

	it('builds pins and body from the shapes', () => {
		const model = converter.build(makeComponent([VCC_PIN, BODY_RECT]));
		expect(model.isFallback).toBe(false);
		expect(model.info.refPrefix).toBe('U');
		expect(model.pins).toEqual([{
			number: '0',
			name: 'VCC',
			type: 'input',
			style: 'line',
			x: 100,
			y: 100,
			rotation: 0,
			length: 20,
		}]);
		expect(model.rectangles).toEqual([{ x: 0, y: 0, width: 200, height: 200, fill: 'none' }]);
		expect(model.pinExtent).toEqual({ yMin: 100, yMax: 100 });
	});

	it('keeps equal-radius ellipses as circles only', () => {
		const model = converter.build(makeComponent([
			VCC_PIN,
			'E~5~5~3~3~#000~1~0~none~gge9~0',
			'E~5~5~3~4~#000~1~0~none~gge10~0',
		]));
		expect(model.circles).toEqual([{ cx: 5, cy: 5, radius: 3, fill: 'none' }]);
	});

	it('drops arcs it cannot resolve', () => {
		const model = converter.build(makeComponent([
			VCC_PIN,
			'A~M 0 0 A 10 10 0 0 1 20 0~~#000~1~0~none~gge11~0',
			'A~M 0 0 Q 5 5 10 0~~#000~1~0~none~gge12~0',
		]));
		expect(model.arcs).toHaveLength(1);
	});

	it('turns polygons into closed polylines', () => {
		const model = converter.build(makeComponent(['PG~0 0 10 0 10 10~#000~1~0~none~gge13~0']));
		expect(model.polylines).toEqual([{ points: [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }], closed: true }]);
	});

	it('synthesizes a symbol when there is nothing to draw', () => {
		const model = converter.build(makeComponent(['T~L~0~0~0~#000~~7pt~~~~~hello~1~~gge14']), { padNumbers: ['1', '2', '3'] });
		expect(model.isFallback).toBe(true);
		expect(model.pins.map(pin => pin.number)).toEqual(['1', '2', '3']);
	});

	it('needs the symbol section', () => {
		expect(() => converter.build({ info: { name: 'X', prefix: 'U', package: 'P' } })).toThrow(MissingSectionError);
	});
});

describe('SymbolConverter.convertToSymbolEntry', () => {
	const converter = new SymbolConverter();
	const model = converter.build(makeComponent([VCC_PIN, BODY_RECT]));
	const entry = converter.convertToSymbolEntry(model, { footprintLibName: 'lcsc_parts' });
	const lines = entry.split('\n');

	it('wraps the record in a tab-indented symbol block', () => {
		expect(lines[0]).toBe('\t(symbol "TestPart"');
		expect(lines[1]).toBe('\t\t(in_bom yes)');
		expect(lines[2]).toBe('\t\t(on_board yes)');
		expect(entry.endsWith('\t\t)\n\t)\n')).toBe(true);
	});

	it('renders the pin at the transformed position', () => {
		const at = lines.indexOf('\t\t\t(pin input line');
		expect(at).toBeGreaterThan(0);
		expect(lines.slice(at + 1, at + 5)).toEqual([
			'\t\t\t\t(at 25.40 -25.40 180)',
			'\t\t\t\t(length 5.08)',
			'\t\t\t\t(name "VCC" (effects (font (size 1.27 1.27))))',
			'\t\t\t\t(number "0" (effects (font (size 1.27 1.27))))',
		]);
	});

	it('renders the body rectangle without fill', () => {
		const at = lines.indexOf('\t\t\t(rectangle');
		expect(at).toBeGreaterThan(0);
		expect(lines[at + 1]).toBe('\t\t\t\t(start 0.00 0.00)');
		expect(lines[at + 2]).toBe('\t\t\t\t(end 50.80 -50.80)');
		expect(lines[at + 4]).toBe('\t\t\t\t(fill (type none))');
		expect(at).toBeLessThan(lines.indexOf('\t\t\t(pin input line'));
	});

	it('places properties around the pins', () => {
		expect(lines[3]).toBe('\t\t(property "Reference" "U" (id 0) (at 0 -20.32 0) (effects (font (size 1.27 1.27))))');
		expect(lines[4]).toBe('\t\t(property "Value" "TestPart" (id 1) (at 0 -30.48 0) (effects (font (size 1.27 1.27))))');
		expect(lines[5]).toBe('\t\t(property "Footprint" "lcsc_parts:SOT-23-5" (id 2) (at 0 -33.02 0) (effects (font (size 1.27 1.27)) hide))');
		expect(lines[6]).toBe('\t\t(symbol "TestPart_0_1"');
	});

	it('subtracts the symbol origin', () => {
		const shifted = converter.build(makeComponent([VCC_PIN, BODY_RECT], { x: 100, y: 100 }));
		const text = converter.convertToSymbolEntry(shifted);
		expect(text.split('\n')).toContain('\t\t\t\t(at 0.00 0.00 180)');
		expect(text.split('\n')).toContain('\t\t(property "Footprint" "SOT-23-5" (id 2) (at 0 -7.62 0) (effects (font (size 1.27 1.27)) hide))');
	});

	it('renders arcs through their midpoint', () => {
		const withArc = converter.build(makeComponent([VCC_PIN, 'A~M 0 0 A 10 10 0 0 1 20 0~~#000~1~0~none~gge11~0']));
		const text = converter.convertToSymbolEntry(withArc).split('\n');
		const at = text.indexOf('\t\t\t(arc');
		expect(text.slice(at + 1, at + 4)).toEqual([
			'\t\t\t\t(start 0.00 0.00)',
			'\t\t\t\t(mid 2.54 2.54)',
			'\t\t\t\t(end 5.08 0.00)',
		]);
	});
});
