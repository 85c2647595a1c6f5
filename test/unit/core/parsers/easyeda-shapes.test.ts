import { describe, expect, it } from 'vitest';
import {
	decodeArc,
	decodeEllipse,
	decodeFootprintText,
	decodePad,
	decodePin,
	decodePolygon,
	decodeRectangle,
	decodeTrack,
	parseFootprintShapes,
	parsePinType,
	parseSymbolShapes,
	shapeTag,
} from '../../../../src/core/parsers/easyeda-shapes';
import { PAD_FIELDS, PIN_MIN_GROUPS, RECT_ROUNDED_MIN_TOKENS } from '../../../../src/core/parsers/fields';
import { BODY_RECT, MODEL_NODE, ORIGIN_PAD, VCC_PIN } from '../../../fixtures/cadData';

const CLOCK_PIN = 'P~show~0~2~10~20~90~gge5~0^^10~20^^M 10 20 v 15~#880000^^show~14~25~0~CLK~start~~~#0000FF^^show~8~22~90~2~end~~~#0000FF^^0~7~20^^show~M 13 20 L 10 17';

describe('field tables', () => {
	it('indexes pad tokens with the tag at position zero', () => {
		const tokens = ORIGIN_PAD.split('~');
		expect(tokens[PAD_FIELDS.shape]).toBe('RECT');
		expect(tokens[PAD_FIELDS.number]).toBe('1');
		expect(tokens[PAD_FIELDS.holeRadius]).toBe('0');
	});

	it('accepts six pin groups', () => {
		expect(PIN_MIN_GROUPS).toBe(6);
		expect(VCC_PIN.split('^^')).toHaveLength(6);
	});
});

describe('decodePin', () => {
	it('decodes the pin groups', () => {
		const result = decodePin(VCC_PIN);
		expect(result.ok).toBe(true);
		if (!result.ok)
			return;
		const pin = result.value;
		expect(pin.settings.electricalType).toBe('input');
		expect(pin.settings.spiceNumber).toBe('0');
		expect(pin.settings.x).toBe(100);
		expect(pin.settings.y).toBe(100);
		expect(pin.settings.rotation).toBe(0);
		expect(pin.path.vector).toBe('M0,0h-20');
		expect(pin.displayName.text).toBe('VCC');
		expect(pin.displayName.size).toBe(7);
		expect(pin.invertedDot.visible).toBe(false);
		expect(pin.clockMark.visible).toBe(false);
	});

	it('reads the clock group and folds vertical pin paths', () => {
		const result = decodePin(CLOCK_PIN);
		expect(result.ok).toBe(true);
		if (!result.ok)
			return;
		expect(result.value.settings.rotation).toBe(90);
		expect(result.value.settings.electricalType).toBe('unspecified');
		expect(result.value.path.vector).toBe('M 10 20 h 15');
		expect(result.value.displayNumber.text).toBe('2');
		expect(result.value.clockMark.visible).toBe(true);
		expect(result.value.invertedDot.visible).toBe(false);
	});

	it('skips records with too few groups', () => {
		const result = decodePin('P~show~1~0~100~100~0~PIN1^^0~100^^M0,0h-20~#000000^^show~0~0~0~VCC~end~Arial~7pt^^');
		expect(result).toEqual({ ok: false, reason: 'pin record has 5 groups, needs 6' });
	});
});

describe('parsePinType', () => {
	it('maps the electrical type codes', () => {
		expect(parsePinType('0')).toBe('unspecified');
		expect(parsePinType('1')).toBe('input');
		expect(parsePinType('2')).toBe('output');
		expect(parsePinType('3')).toBe('bidirectional');
		expect(parsePinType('4')).toBe('power');
		expect(parsePinType('9')).toBe('unspecified');
		expect(parsePinType('')).toBe('unspecified');
	});
});

describe('decodeRectangle', () => {
	it('reads the compact layout', () => {
		expect(BODY_RECT.split('~').length).toBeLessThan(RECT_ROUNDED_MIN_TOKENS);
		const result = decodeRectangle(BODY_RECT);
		expect(result.ok && result.value).toMatchObject({ x: 0, y: 0, rx: 0, ry: 0, width: 200, height: 200, fillColor: 'none', id: 'rect1' });
	});

	it('reads the layout with corner radii', () => {
		const result = decodeRectangle('R~-20~-30~2~2~40~60~#880000~1~0~#EFEFEF~gge7~0');
		expect(result.ok && result.value).toMatchObject({ x: -20, y: -30, rx: 2, ry: 2, width: 40, height: 60, fillColor: '#EFEFEF', id: 'gge7' });
	});

	it('skips truncated records', () => {
		expect(decodeRectangle('R~1~2').ok).toBe(false);
	});
});

describe('other symbol decoders', () => {
	it('decodes ellipses', () => {
		const result = decodeEllipse('E~5~5~3~4~#000~1~0~none~gge9~0');
		expect(result.ok && result.value).toMatchObject({ cx: 5, cy: 5, rx: 3, ry: 4 });
	});

	it('rejects arcs without a path', () => {
		expect(decodeArc('A~~~#000~1~0~none~gge11~0')).toEqual({ ok: false, reason: 'arc record has an empty path' });
	});

	it('rejects polygons with a single point', () => {
		expect(decodePolygon('PG~0 0~#000~1~0~none~gge12~0')).toEqual({ ok: false, reason: 'PG record has fewer than two points' });
	});
});

describe('footprint decoders', () => {
	it('decodes a surface-mount pad', () => {
		const result = decodePad(ORIGIN_PAD);
		expect(result.ok && result.value).toMatchObject({
			shape: 'RECT',
			centerX: 4000,
			centerY: 3000,
			width: 10,
			height: 10,
			layerId: 1,
			number: '1',
			holeRadius: 0,
			polygonPoints: [],
			rotation: 0,
			plated: false,
		});
	});

	it('falls back to RECT for an unknown pad shape', () => {
		const result = decodePad('PAD~STAR~0~0~10~10~1~~1~0~~0');
		expect(result.ok && result.value.shape).toBe('RECT');
	});

	it('needs two track points', () => {
		expect(decodeTrack('TRACK~1~3~~0 0~gge20~0')).toEqual({ ok: false, reason: 'TRACK record has fewer than two points' });
		const result = decodeTrack('TRACK~1~3~~0 0 10 0 10 10~gge20~0');
		expect(result.ok && result.value.points).toEqual([0, 0, 10, 0, 10, 10]);
	});

	it('marks text with display none as hidden', () => {
		const result = decodeFootprintText('TEXT~N~4000~2990~0.6~0~0~3~~4.5~U1~M0,0~none~gge23');
		expect(result.ok && result.value).toMatchObject({ text: 'U1', fontSize: 4.5, layerId: 3, visible: false });
	});
});

describe('parseSymbolShapes', () => {
	it('sorts records by kind and tallies skips', () => {
		const parsed = parseSymbolShapes([
			VCC_PIN,
			BODY_RECT,
			'E~5~5~3~3~#000~1~0~none~gge9~0',
			'PL~0 0 10 10~#000~1~0~none~gge10~0',
			'PG~0 0~#000~1~0~none~gge12~0',
			'J~1~2~3',
			42,
			'',
		]);
		expect(parsed.pins).toHaveLength(1);
		expect(parsed.rectangles).toHaveLength(1);
		expect(parsed.ellipses).toHaveLength(1);
		expect(parsed.polylines).toHaveLength(1);
		expect(parsed.polygons).toHaveLength(0);
		expect(parsed.skipped).toEqual([{ tag: 'PG', index: 4, reason: 'PG record has fewer than two points' }]);
		expect(parsed.ignored).toBe(3);
	});
});

describe('parseFootprintShapes', () => {
	it('leaves SVGNODE records to the model lookup', () => {
		const parsed = parseFootprintShapes([
			ORIGIN_PAD,
			MODEL_NODE,
			'HOLE~10~10~2~gge22~0',
			'RECT~0~0~20~10~3~gge24~0~0.5',
		]);
		expect(parsed.pads).toHaveLength(1);
		expect(parsed.holes).toEqual([{ cx: 10, cy: 10, radius: 2, id: 'gge22' }]);
		expect(parsed.rects).toHaveLength(1);
		expect(parsed.ignored).toBe(0);
		expect(parsed.skipped).toEqual([]);
	});
});

describe('shapeTag', () => {
	it('returns the text before the first separator', () => {
		expect(shapeTag('PAD~RECT')).toBe('PAD');
		expect(shapeTag('SVGNODE')).toBe('SVGNODE');
	});
});
