import type { Logger } from '../../logger';
import type {
	DecodeResult,
	EasyEDAArc,
	EasyEDACircle,
	EasyEDAEllipse,
	EasyEDAFootprintArc,
	EasyEDAFootprintCircle,
	EasyEDAFootprintRect,
	EasyEDAFootprintText,
	EasyEDAHole,
	EasyEDAPad,
	EasyEDAPadShape,
	EasyEDAPath,
	EasyEDAPin,
	EasyEDAPinType,
	EasyEDAPolyline,
	EasyEDARectangle,
	EasyEDAStroke,
	EasyEDASymbolText,
	EasyEDATrack,
	ParsedFootprintShapes,
	ParsedSymbolShapes,
} from '../types/easyeda';
import { getLogger } from '../../logger';
import { toPinRotation } from '../converter/units';
import {
	ARC_FIELDS,
	CIRCLE_FIELDS,
	ELLIPSE_FIELDS,
	FIELD_SEPARATOR,
	FOOTPRINT_ARC_FIELDS,
	FOOTPRINT_CIRCLE_FIELDS,
	FOOTPRINT_RECT_FIELDS,
	FOOTPRINT_TEXT_FIELDS,
	HOLE_FIELDS,
	MIN_TOKENS,
	PAD_FIELDS,
	PATH_FIELDS,
	PIN_CLOCK_FIELDS,
	PIN_DOT_FIELDS,
	PIN_GROUP_SEPARATOR,
	PIN_GROUPS,
	PIN_INVERTED_DOT_FIELDS,
	PIN_LABEL_FIELDS,
	PIN_MIN_GROUPS,
	PIN_PATH_FIELDS,
	PIN_SETTINGS_FIELDS,
	POLY_FIELDS,
	RECT_COMPACT_FIELDS,
	RECT_FIELDS,
	RECT_ROUNDED_MIN_TOKENS,
	SYMBOL_TEXT_FIELDS,
	TRACK_FIELDS,
} from './fields';
import { fieldAt, parseBool, parseNumberList, parseShow, safeParseFloat, safeParseInt } from './utils';

export type SymbolShape =
	| { kind: 'pin'; value: EasyEDAPin }
	| { kind: 'rectangle'; value: EasyEDARectangle }
	| { kind: 'circle'; value: EasyEDACircle }
	| { kind: 'ellipse'; value: EasyEDAEllipse }
	| { kind: 'arc'; value: EasyEDAArc }
	| { kind: 'polyline'; value: EasyEDAPolyline }
	| { kind: 'polygon'; value: EasyEDAPolyline }
	| { kind: 'path'; value: EasyEDAPath }
	| { kind: 'text'; value: EasyEDASymbolText };

export type FootprintShape =
	| { kind: 'pad'; value: EasyEDAPad }
	| { kind: 'track'; value: EasyEDATrack }
	| { kind: 'circle'; value: EasyEDAFootprintCircle }
	| { kind: 'text'; value: EasyEDAFootprintText }
	| { kind: 'hole'; value: EasyEDAHole }
	| { kind: 'arc'; value: EasyEDAFootprintArc }
	| { kind: 'rect'; value: EasyEDAFootprintRect };

export type ShapeDecoder<T> = (record: string) => DecodeResult<T>;

function ok<T>(value: T): DecodeResult<T> {
	return { ok: true, value };
}

function skip<T>(reason: string): DecodeResult<T> {
	return { ok: false, reason };
}

function tokensOf(record: string): string[] {
	return record.split(FIELD_SEPARATOR);
}

function tooShort<T>(tag: string, tokens: string[], min: number): DecodeResult<T> | undefined {
	if (tokens.length < min)
		return skip(`${tag} record has ${tokens.length} fields, needs ${min}`);
	return undefined;
}

const PIN_TYPES: Readonly<Record<number, EasyEDAPinType>> = {
	0: 'unspecified',
	1: 'input',
	2: 'output',
	3: 'bidirectional',
	4: 'power',
};

export function parsePinType(value: string): EasyEDAPinType {
	return PIN_TYPES[safeParseInt(value)] ?? 'unspecified';
}

function parseFontSize(value: string): number {
	if (!value)
		return 7;
	return safeParseFloat(value.replace('pt', ''), 7);
}

function strokeOf(tokens: string[], fields: {
	strokeColor: number;
	strokeWidth: number;
	strokeStyle: number;
	fillColor: number;
	id: number;
	locked: number;
}): EasyEDAStroke {
	return {
		strokeColor: fieldAt(tokens, fields.strokeColor),
		strokeWidth: safeParseFloat(fieldAt(tokens, fields.strokeWidth), 1),
		strokeStyle: fieldAt(tokens, fields.strokeStyle),
		fillColor: fieldAt(tokens, fields.fillColor),
		id: fieldAt(tokens, fields.id),
		locked: parseBool(fieldAt(tokens, fields.locked)),
	};
}

// ---------------- symbol decoders ----------------

export const decodePin: ShapeDecoder<EasyEDAPin> = (record) => {
	const groups = record.split(PIN_GROUP_SEPARATOR);
	if (groups.length < PIN_MIN_GROUPS)
		return skip(`pin record has ${groups.length} groups, needs ${PIN_MIN_GROUPS}`);

	const group = (index: number) => tokensOf(groups[index] ?? '');
	const settings = group(PIN_GROUPS.settings);
	const dot = group(PIN_GROUPS.startDot);
	const path = group(PIN_GROUPS.path);
	const name = group(PIN_GROUPS.name);
	const number = group(PIN_GROUPS.number);
	const inverted = group(PIN_GROUPS.invertedDot);
	const clock = group(PIN_GROUPS.clockMark);

	return ok({
		settings: {
			visible: parseShow(fieldAt(settings, PIN_SETTINGS_FIELDS.visible)),
			electricalType: parsePinType(fieldAt(settings, PIN_SETTINGS_FIELDS.electricalType)),
			spiceNumber: fieldAt(settings, PIN_SETTINGS_FIELDS.spiceNumber),
			x: safeParseFloat(fieldAt(settings, PIN_SETTINGS_FIELDS.x)),
			y: safeParseFloat(fieldAt(settings, PIN_SETTINGS_FIELDS.y)),
			rotation: toPinRotation(safeParseFloat(fieldAt(settings, PIN_SETTINGS_FIELDS.rotation))),
			id: fieldAt(settings, PIN_SETTINGS_FIELDS.id),
			locked: parseBool(fieldAt(settings, PIN_SETTINGS_FIELDS.locked)),
		},
		startDot: {
			x: safeParseFloat(fieldAt(dot, PIN_DOT_FIELDS.x)),
			y: safeParseFloat(fieldAt(dot, PIN_DOT_FIELDS.y)),
		},
		path: {
			// vertical segments are folded into horizontal ones so the length sits after the last `h`
			vector: fieldAt(path, PIN_PATH_FIELDS.vector).replaceAll('v', 'h'),
			color: fieldAt(path, PIN_PATH_FIELDS.color) || '#000000',
		},
		displayName: {
			visible: parseShow(fieldAt(name, PIN_LABEL_FIELDS.visible)),
			x: safeParseFloat(fieldAt(name, PIN_LABEL_FIELDS.x)),
			y: safeParseFloat(fieldAt(name, PIN_LABEL_FIELDS.y)),
			rotation: safeParseFloat(fieldAt(name, PIN_LABEL_FIELDS.rotation)),
			text: fieldAt(name, PIN_LABEL_FIELDS.text),
			anchor: fieldAt(name, PIN_LABEL_FIELDS.anchor),
			font: fieldAt(name, PIN_LABEL_FIELDS.font),
			size: parseFontSize(fieldAt(name, PIN_LABEL_FIELDS.size)),
		},
		displayNumber: {
			visible: parseShow(fieldAt(number, PIN_LABEL_FIELDS.visible)),
			x: safeParseFloat(fieldAt(number, PIN_LABEL_FIELDS.x)),
			y: safeParseFloat(fieldAt(number, PIN_LABEL_FIELDS.y)),
			rotation: safeParseFloat(fieldAt(number, PIN_LABEL_FIELDS.rotation)),
			text: fieldAt(number, PIN_LABEL_FIELDS.text),
		},
		invertedDot: {
			visible: parseShow(fieldAt(inverted, PIN_INVERTED_DOT_FIELDS.visible)),
			x: safeParseFloat(fieldAt(inverted, PIN_INVERTED_DOT_FIELDS.x)),
			y: safeParseFloat(fieldAt(inverted, PIN_INVERTED_DOT_FIELDS.y)),
		},
		clockMark: {
			visible: parseShow(fieldAt(clock, PIN_CLOCK_FIELDS.visible)),
			vector: fieldAt(clock, PIN_CLOCK_FIELDS.vector),
		},
	});
};

export const decodeRectangle: ShapeDecoder<EasyEDARectangle> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDARectangle>('R', tokens, MIN_TOKENS.R);
	if (short)
		return short;

	if (tokens.length >= RECT_ROUNDED_MIN_TOKENS) {
		return ok({
			x: safeParseFloat(fieldAt(tokens, RECT_FIELDS.x)),
			y: safeParseFloat(fieldAt(tokens, RECT_FIELDS.y)),
			rx: safeParseFloat(fieldAt(tokens, RECT_FIELDS.rx)),
			ry: safeParseFloat(fieldAt(tokens, RECT_FIELDS.ry)),
			width: safeParseFloat(fieldAt(tokens, RECT_FIELDS.width)),
			height: safeParseFloat(fieldAt(tokens, RECT_FIELDS.height)),
			...strokeOf(tokens, RECT_FIELDS),
		});
	}
	return ok({
		x: safeParseFloat(fieldAt(tokens, RECT_COMPACT_FIELDS.x)),
		y: safeParseFloat(fieldAt(tokens, RECT_COMPACT_FIELDS.y)),
		rx: 0,
		ry: 0,
		width: safeParseFloat(fieldAt(tokens, RECT_COMPACT_FIELDS.width)),
		height: safeParseFloat(fieldAt(tokens, RECT_COMPACT_FIELDS.height)),
		...strokeOf(tokens, RECT_COMPACT_FIELDS),
	});
};

export const decodeCircle: ShapeDecoder<EasyEDACircle> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDACircle>('C', tokens, MIN_TOKENS.C);
	if (short)
		return short;
	return ok({
		cx: safeParseFloat(fieldAt(tokens, CIRCLE_FIELDS.cx)),
		cy: safeParseFloat(fieldAt(tokens, CIRCLE_FIELDS.cy)),
		radius: safeParseFloat(fieldAt(tokens, CIRCLE_FIELDS.radius)),
		...strokeOf(tokens, CIRCLE_FIELDS),
	});
};

export const decodeEllipse: ShapeDecoder<EasyEDAEllipse> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAEllipse>('E', tokens, MIN_TOKENS.E);
	if (short)
		return short;
	return ok({
		cx: safeParseFloat(fieldAt(tokens, ELLIPSE_FIELDS.cx)),
		cy: safeParseFloat(fieldAt(tokens, ELLIPSE_FIELDS.cy)),
		rx: safeParseFloat(fieldAt(tokens, ELLIPSE_FIELDS.rx)),
		ry: safeParseFloat(fieldAt(tokens, ELLIPSE_FIELDS.ry)),
		...strokeOf(tokens, ELLIPSE_FIELDS),
	});
};

export const decodeArc: ShapeDecoder<EasyEDAArc> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAArc>('A', tokens, MIN_TOKENS.A);
	if (short)
		return short;
	const path = fieldAt(tokens, ARC_FIELDS.path);
	if (!path.trim())
		return skip('arc record has an empty path');
	return ok({
		path,
		helperDots: fieldAt(tokens, ARC_FIELDS.helperDots),
		...strokeOf(tokens, ARC_FIELDS),
	});
};

function decodePoly(tag: 'PL' | 'PG'): ShapeDecoder<EasyEDAPolyline> {
	return (record) => {
		const tokens = tokensOf(record);
		const short = tooShort<EasyEDAPolyline>(tag, tokens, MIN_TOKENS[tag]);
		if (short)
			return short;
		const points = fieldAt(tokens, POLY_FIELDS.points);
		if (parseNumberList(points).length < 4)
			return skip(`${tag} record has fewer than two points`);
		return ok({ points, ...strokeOf(tokens, POLY_FIELDS) });
	};
}

export const decodePolyline = decodePoly('PL');
export const decodePolygon = decodePoly('PG');

export const decodePath: ShapeDecoder<EasyEDAPath> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAPath>('PATH', tokens, MIN_TOKENS.PATH);
	if (short)
		return short;
	return ok({ path: fieldAt(tokens, PATH_FIELDS.path), ...strokeOf(tokens, PATH_FIELDS) });
};

export const decodeSymbolText: ShapeDecoder<EasyEDASymbolText> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDASymbolText>('T', tokens, MIN_TOKENS.T);
	if (short)
		return short;
	return ok({
		mark: fieldAt(tokens, SYMBOL_TEXT_FIELDS.mark),
		x: safeParseFloat(fieldAt(tokens, SYMBOL_TEXT_FIELDS.x)),
		y: safeParseFloat(fieldAt(tokens, SYMBOL_TEXT_FIELDS.y)),
		rotation: safeParseFloat(fieldAt(tokens, SYMBOL_TEXT_FIELDS.rotation)),
		color: fieldAt(tokens, SYMBOL_TEXT_FIELDS.color),
		fontSize: parseFontSize(fieldAt(tokens, SYMBOL_TEXT_FIELDS.fontSize)),
		text: fieldAt(tokens, SYMBOL_TEXT_FIELDS.text),
		id: fieldAt(tokens, SYMBOL_TEXT_FIELDS.id),
	});
};

// ---------------- footprint decoders ----------------

const PAD_SHAPE_NAMES: readonly EasyEDAPadShape[] = ['RECT', 'ELLIPSE', 'OVAL', 'POLYGON'];

function parsePadShape(value: string): EasyEDAPadShape {
	const upper = value.trim().toUpperCase();
	return PAD_SHAPE_NAMES.find(name => name === upper) ?? 'RECT';
}

export const decodePad: ShapeDecoder<EasyEDAPad> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAPad>('PAD', tokens, MIN_TOKENS.PAD);
	if (short)
		return short;

	const holeRadius = safeParseFloat(fieldAt(tokens, PAD_FIELDS.holeRadius));
	const platedToken = fieldAt(tokens, PAD_FIELDS.plated);
	return ok({
		shape: parsePadShape(fieldAt(tokens, PAD_FIELDS.shape)),
		centerX: safeParseFloat(fieldAt(tokens, PAD_FIELDS.centerX)),
		centerY: safeParseFloat(fieldAt(tokens, PAD_FIELDS.centerY)),
		width: safeParseFloat(fieldAt(tokens, PAD_FIELDS.width)),
		height: safeParseFloat(fieldAt(tokens, PAD_FIELDS.height)),
		layerId: safeParseInt(fieldAt(tokens, PAD_FIELDS.layerId), 1),
		net: fieldAt(tokens, PAD_FIELDS.net),
		number: fieldAt(tokens, PAD_FIELDS.number),
		holeRadius,
		polygonPoints: parseNumberList(fieldAt(tokens, PAD_FIELDS.points)),
		rotation: safeParseFloat(fieldAt(tokens, PAD_FIELDS.rotation)),
		id: fieldAt(tokens, PAD_FIELDS.id),
		holeLength: safeParseFloat(fieldAt(tokens, PAD_FIELDS.holeLength)),
		plated: platedToken ? platedToken === 'Y' || parseBool(platedToken) : holeRadius > 0,
	});
};

export const decodeTrack: ShapeDecoder<EasyEDATrack> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDATrack>('TRACK', tokens, MIN_TOKENS.TRACK);
	if (short)
		return short;
	const points = parseNumberList(fieldAt(tokens, TRACK_FIELDS.points));
	if (points.length < 4)
		return skip('TRACK record has fewer than two points');
	return ok({
		strokeWidth: safeParseFloat(fieldAt(tokens, TRACK_FIELDS.strokeWidth)),
		layerId: safeParseInt(fieldAt(tokens, TRACK_FIELDS.layerId), 3),
		net: fieldAt(tokens, TRACK_FIELDS.net),
		points,
		id: fieldAt(tokens, TRACK_FIELDS.id),
	});
};

export const decodeFootprintCircle: ShapeDecoder<EasyEDAFootprintCircle> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAFootprintCircle>('CIRCLE', tokens, MIN_TOKENS.CIRCLE);
	if (short)
		return short;
	return ok({
		cx: safeParseFloat(fieldAt(tokens, FOOTPRINT_CIRCLE_FIELDS.cx)),
		cy: safeParseFloat(fieldAt(tokens, FOOTPRINT_CIRCLE_FIELDS.cy)),
		radius: safeParseFloat(fieldAt(tokens, FOOTPRINT_CIRCLE_FIELDS.radius)),
		strokeWidth: safeParseFloat(fieldAt(tokens, FOOTPRINT_CIRCLE_FIELDS.strokeWidth)),
		layerId: safeParseInt(fieldAt(tokens, FOOTPRINT_CIRCLE_FIELDS.layerId), 3),
		id: fieldAt(tokens, FOOTPRINT_CIRCLE_FIELDS.id),
	});
};

export const decodeFootprintText: ShapeDecoder<EasyEDAFootprintText> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAFootprintText>('TEXT', tokens, MIN_TOKENS.TEXT);
	if (short)
		return short;
	return ok({
		kind: fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.kind),
		x: safeParseFloat(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.x)),
		y: safeParseFloat(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.y)),
		strokeWidth: safeParseFloat(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.strokeWidth)),
		rotation: safeParseFloat(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.rotation)),
		mirror: parseBool(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.mirror)),
		layerId: safeParseInt(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.layerId), 3),
		fontSize: safeParseFloat(fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.fontSize)),
		text: fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.text),
		visible: fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.display) !== 'none',
		id: fieldAt(tokens, FOOTPRINT_TEXT_FIELDS.id),
	});
};

export const decodeHole: ShapeDecoder<EasyEDAHole> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAHole>('HOLE', tokens, MIN_TOKENS.HOLE);
	if (short)
		return short;
	return ok({
		cx: safeParseFloat(fieldAt(tokens, HOLE_FIELDS.cx)),
		cy: safeParseFloat(fieldAt(tokens, HOLE_FIELDS.cy)),
		radius: safeParseFloat(fieldAt(tokens, HOLE_FIELDS.radius)),
		id: fieldAt(tokens, HOLE_FIELDS.id),
	});
};

export const decodeFootprintArc: ShapeDecoder<EasyEDAFootprintArc> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAFootprintArc>('ARC', tokens, MIN_TOKENS.ARC);
	if (short)
		return short;
	return ok({
		strokeWidth: safeParseFloat(fieldAt(tokens, FOOTPRINT_ARC_FIELDS.strokeWidth)),
		layerId: safeParseInt(fieldAt(tokens, FOOTPRINT_ARC_FIELDS.layerId), 3),
		path: fieldAt(tokens, FOOTPRINT_ARC_FIELDS.path),
		id: fieldAt(tokens, FOOTPRINT_ARC_FIELDS.id),
	});
};

export const decodeFootprintRect: ShapeDecoder<EasyEDAFootprintRect> = (record) => {
	const tokens = tokensOf(record);
	const short = tooShort<EasyEDAFootprintRect>('RECT', tokens, MIN_TOKENS.RECT);
	if (short)
		return short;
	return ok({
		x: safeParseFloat(fieldAt(tokens, FOOTPRINT_RECT_FIELDS.x)),
		y: safeParseFloat(fieldAt(tokens, FOOTPRINT_RECT_FIELDS.y)),
		width: safeParseFloat(fieldAt(tokens, FOOTPRINT_RECT_FIELDS.width)),
		height: safeParseFloat(fieldAt(tokens, FOOTPRINT_RECT_FIELDS.height)),
		layerId: safeParseInt(fieldAt(tokens, FOOTPRINT_RECT_FIELDS.layerId), 3),
		strokeWidth: safeParseFloat(fieldAt(tokens, FOOTPRINT_RECT_FIELDS.strokeWidth)),
		id: fieldAt(tokens, FOOTPRINT_RECT_FIELDS.id),
	});
};

// ---------------- registries ----------------

function tagged<K extends string, T>(kind: K, decoder: ShapeDecoder<T>): ShapeDecoder<{ kind: K; value: T }> {
	return (record) => {
		const result = decoder(record);
		return result.ok ? ok({ kind, value: result.value }) : result;
	};
}

export const SYMBOL_DECODERS = new Map<string, ShapeDecoder<SymbolShape>>([
	['P', tagged('pin', decodePin)],
	['R', tagged('rectangle', decodeRectangle)],
	['C', tagged('circle', decodeCircle)],
	['E', tagged('ellipse', decodeEllipse)],
	['A', tagged('arc', decodeArc)],
	['PL', tagged('polyline', decodePolyline)],
	['PG', tagged('polygon', decodePolygon)],
	['PATH', tagged('path', decodePath)],
	['T', tagged('text', decodeSymbolText)],
]);

export const FOOTPRINT_DECODERS = new Map<string, ShapeDecoder<FootprintShape>>([
	['PAD', tagged('pad', decodePad)],
	['TRACK', tagged('track', decodeTrack)],
	['CIRCLE', tagged('circle', decodeFootprintCircle)],
	['TEXT', tagged('text', decodeFootprintText)],
	['HOLE', tagged('hole', decodeHole)],
	['ARC', tagged('arc', decodeFootprintArc)],
	['RECT', tagged('rect', decodeFootprintRect)],
]);

/** Tags looked up separately from the raw shape list (see `findModel3DReference`). */
const DEFERRED_FOOTPRINT_TAGS = new Set(['SVGNODE']);

export function registerSymbolDecoder(tag: string, decoder: ShapeDecoder<SymbolShape>): void {
	SYMBOL_DECODERS.set(tag, decoder);
}

export function registerFootprintDecoder(tag: string, decoder: ShapeDecoder<FootprintShape>): void {
	FOOTPRINT_DECODERS.set(tag, decoder);
}

export function shapeTag(record: string): string {
	const idx = record.indexOf(FIELD_SEPARATOR);
	return idx < 0 ? record : record.slice(0, idx);
}

interface DecodeTally {
	skipped: ParsedSymbolShapes['skipped'];
	ignored: number;
}

function decodeAll<T>(
	shapes: readonly unknown[],
	registry: ReadonlyMap<string, ShapeDecoder<T>>,
	logger: Logger,
	onValue: (value: T) => void,
	deferred: ReadonlySet<string> = new Set(),
): DecodeTally {
	const tally: DecodeTally = { skipped: [], ignored: 0 };
	shapes.forEach((shape, index) => {
		if (typeof shape !== 'string' || !shape.trim()) {
			tally.ignored++;
			return;
		}
		const tag = shapeTag(shape);
		if (deferred.has(tag))
			return;
		const decoder = registry.get(tag);
		if (!decoder) {
			tally.ignored++;
			return;
		}
		const result = decoder(shape);
		if (result.ok) {
			onValue(result.value);
			return;
		}
		tally.skipped.push({ tag, index, reason: result.reason });
		logger.warn(`Skipped ${tag} shape #${index}: ${result.reason}`);
	});
	return tally;
}

export function parseSymbolShapes(shapes: readonly unknown[], logger: Logger = getLogger('parser')): ParsedSymbolShapes {
	const out: Omit<ParsedSymbolShapes, 'skipped' | 'ignored'> = {
		pins: [],
		rectangles: [],
		circles: [],
		ellipses: [],
		arcs: [],
		polylines: [],
		polygons: [],
		paths: [],
		texts: [],
	};

	const tally = decodeAll(shapes, SYMBOL_DECODERS, logger, (shape) => {
		switch (shape.kind) {
			case 'pin':
				out.pins.push(shape.value);
				break;
			case 'rectangle':
				out.rectangles.push(shape.value);
				break;
			case 'circle':
				out.circles.push(shape.value);
				break;
			case 'ellipse':
				out.ellipses.push(shape.value);
				break;
			case 'arc':
				out.arcs.push(shape.value);
				break;
			case 'polyline':
				out.polylines.push(shape.value);
				break;
			case 'polygon':
				out.polygons.push(shape.value);
				break;
			case 'path':
				out.paths.push(shape.value);
				break;
			case 'text':
				out.texts.push(shape.value);
				break;
		}
	});

	return { ...out, ...tally };
}

export function parseFootprintShapes(shapes: readonly unknown[], logger: Logger = getLogger('parser')): ParsedFootprintShapes {
	const out: Omit<ParsedFootprintShapes, 'skipped' | 'ignored'> = {
		pads: [],
		tracks: [],
		circles: [],
		texts: [],
		holes: [],
		arcs: [],
		rects: [],
	};

	const tally = decodeAll(shapes, FOOTPRINT_DECODERS, logger, (shape) => {
		switch (shape.kind) {
			case 'pad':
				out.pads.push(shape.value);
				break;
			case 'track':
				out.tracks.push(shape.value);
				break;
			case 'circle':
				out.circles.push(shape.value);
				break;
			case 'text':
				out.texts.push(shape.value);
				break;
			case 'hole':
				out.holes.push(shape.value);
				break;
			case 'arc':
				out.arcs.push(shape.value);
				break;
			case 'rect':
				out.rects.push(shape.value);
				break;
		}
	}, DEFERRED_FOOTPRINT_TAGS);

	return { ...out, ...tally };
}
