import type { Logger } from '../../logger';
import type {
	EasyEDAComponentData,
	EasyEDAPath,
	EasyEDAPin,
	EasyEDAPinType,
	EasyEDAPolyline,
	ParsedSymbolShapes,
} from '../types/easyeda';
import type {
	KiFill,
	KiPinStyle,
	KiPinType,
	Point,
	SymbolArc,
	SymbolCircle,
	SymbolInfo,
	SymbolModel,
	SymbolPin,
	SymbolPolyline,
	SymbolRect,
} from '../types/kicad';
import { getLogger } from '../../logger';
import {
	SYMBOL_BOX_LINE_WIDTH,
	SYMBOL_FIELD_OFFSET_INCREMENT,
	SYMBOL_FIELD_OFFSET_START,
	SYMBOL_PIN_NAME_SIZE,
	SYMBOL_PIN_NUMBER_SIZE,
	SYMBOL_PROPERTY_FONT_SIZE,
} from '../constants/kicad';
import { MissingSectionError } from '../errors';
import { parseSymbolShapes } from '../parsers/easyeda-shapes';
import { parseNumberList } from '../parsers/utils';
import { createFallbackSymbol } from './fallback';
import { arcThreePoints } from './svg-arc';
import { formatNumber, pinOrientation, toDestinationLinear, toSymbolX, toSymbolY } from './units';

/** Pin length, source units, when the path carries none. */
const DEFAULT_PIN_LENGTH = 10;

const PIN_TYPE_MAP: Readonly<Record<EasyEDAPinType, KiPinType>> = {
	unspecified: 'unspecified',
	input: 'input',
	output: 'output',
	bidirectional: 'bidirectional',
	power: 'power_in',
};

export interface SymbolBuildOptions {
	/** Footprint pad numbers, used when the symbol has to be synthesized. */
	padNumbers?: readonly string[];
}

export interface SymbolEntryOptions {
	/** Overrides the record identifier derived from the component name. */
	symbolName?: string;
	/** Footprint library nickname used to qualify the Footprint property. */
	footprintLibName?: string;
}

export function sanitizeSymbolId(name: string): string {
	return name.replaceAll(' ', '_').replaceAll('/', '_');
}

/** Quoted s-expression string. */
export function quote(value: string): string {
	return `"${value.replaceAll('\\', '\\\\').replaceAll('"', '\\"')}"`;
}

/** A trailing `#` marks an active-low name, rendered with an overbar. */
export function applyPinNameStyle(name: string): string {
	return name
		.split('/')
		.map(part => (part.endsWith('#') ? `~{${part.slice(0, -1)}}` : part))
		.join('/');
}

export function pinStyleOf(pin: EasyEDAPin): KiPinStyle {
	const inverted = pin.invertedDot.visible;
	const clock = pin.clockMark.visible;
	if (inverted && clock)
		return 'inverted_clock';
	if (inverted)
		return 'inverted';
	if (clock)
		return 'clock';
	return 'line';
}

/** Length of a pin from the value after the last `h` of its path. */
export function pinLengthOf(vector: string): number {
	const idx = vector.lastIndexOf('h');
	if (idx < 0)
		return DEFAULT_PIN_LENGTH;
	const n = Number.parseFloat(vector.slice(idx + 1));
	return Number.isFinite(n) ? Math.abs(n) : DEFAULT_PIN_LENGTH;
}

export function isFilled(fillColor: string): boolean {
	const value = fillColor.trim().toLowerCase();
	return value !== '' && value !== 'none' && value !== 'transparent';
}

function fillOf(fillColor: string): KiFill {
	return isFilled(fillColor) ? 'background' : 'none';
}

function pointPairs(values: number[]): Point[] {
	const out: Point[] = [];
	for (let i = 0; i + 1 < values.length; i += 2)
		out.push({ x: values[i] ?? 0, y: values[i + 1] ?? 0 });
	return out;
}

/**
 * Straight-segment paths (`M`, `L`, `H`, `V`, `Z`, absolute or relative)
 * become polylines; curves have no counterpart and yield undefined.
 */
export function pathToPolyline(path: EasyEDAPath): SymbolPolyline | undefined {
	const tokens = path.path.match(/[a-z]|-?\d*\.?\d+(?:e[-+]?\d+)?/giu) ?? [];
	const points: Point[] = [];
	let closed = false;
	let command = '';
	let cursor: Point = { x: 0, y: 0 };
	let i = 0;
	const num = (): number | undefined => {
		const token = tokens[i];
		if (token === undefined || /[a-z]/iu.test(token))
			return undefined;
		i++;
		return Number.parseFloat(token);
	};

	while (i < tokens.length) {
		const token = tokens[i] ?? '';
		if (/[a-z]/iu.test(token)) {
			command = token;
			i++;
			if (command === 'Z' || command === 'z') {
				closed = true;
				continue;
			}
			if (!/[mlhv]/iu.test(command))
				return undefined;
		}
		const relative = command === command.toLowerCase();
		const base = relative ? cursor : { x: 0, y: 0 };
		switch (command.toUpperCase()) {
			case 'M':
			case 'L': {
				const x = num();
				const y = num();
				if (x === undefined || y === undefined)
					return undefined;
				cursor = { x: base.x + x, y: base.y + y };
				break;
			}
			case 'H': {
				const x = num();
				if (x === undefined)
					return undefined;
				cursor = { x: relative ? cursor.x + x : x, y: cursor.y };
				break;
			}
			case 'V': {
				const y = num();
				if (y === undefined)
					return undefined;
				cursor = { x: cursor.x, y: relative ? cursor.y + y : y };
				break;
			}
			default:
				return undefined;
		}
		points.push(cursor);
	}

	if (points.length < 2)
		return undefined;
	return { points, closed: closed || isFilled(path.fillColor) };
}

function polylineOf(shape: EasyEDAPolyline, polygon: boolean): SymbolPolyline {
	return {
		points: pointPairs(parseNumberList(shape.points)),
		closed: polygon || isFilled(shape.fillColor),
	};
}

function infoOf(component: EasyEDAComponentData): SymbolInfo {
	const { info } = component;
	return {
		name: info.name,
		refPrefix: info.prefix.replaceAll('?', ''),
		package: info.package,
		manufacturer: info.manufacturer ?? '',
		datasheet: info.datasheet ?? '',
		sourceId: info.lcscId ?? '',
		externalId: info.jlcId ?? '',
	};
}

function hasDrawableContent(parsed: ParsedSymbolShapes): boolean {
	return parsed.pins.length > 0
		|| parsed.rectangles.length > 0
		|| parsed.circles.length > 0
		|| parsed.polygons.length > 0;
}

function strokeLine(): string {
	return `(stroke (width ${SYMBOL_BOX_LINE_WIDTH}) (type default) (color 0 0 0 0))`;
}

export class SymbolConverter {
	private readonly logger: Logger;

	constructor(logger: Logger = getLogger('symbol')) {
		this.logger = logger;
	}

	/**
	 * Decodes the symbol shapes of a component into a `SymbolModel`. A symbol
	 * without pins or body is replaced by a generic rectangular one.
	 */
	build(component: EasyEDAComponentData, options: SymbolBuildOptions = {}): SymbolModel {
		const symbol = component.symbol;
		if (!symbol)
			throw new MissingSectionError('symbol', 'dataStr');

		const info = infoOf(component);
		const parsed = parseSymbolShapes(symbol.shape, this.logger);
		if (!hasDrawableContent(parsed)) {
			this.logger.warn(`Symbol of ${info.name} has no pins or body, synthesizing a generic one`);
			return createFallbackSymbol({ info, padNumbers: options.padNumbers, logger: this.logger });
		}

		const origin = symbol.origin;
		const pins = parsed.pins.map(pin => this.buildPin(pin));
		const rectangles: SymbolRect[] = parsed.rectangles.map(rect => ({
			x: rect.x,
			y: rect.y,
			width: rect.width,
			height: rect.height,
			fill: fillOf(rect.fillColor),
		}));

		const circles: SymbolCircle[] = parsed.circles.map(circle => ({
			cx: circle.cx,
			cy: circle.cy,
			radius: circle.radius,
			fill: fillOf(circle.fillColor),
		}));
		for (const ellipse of parsed.ellipses) {
			if (ellipse.rx !== ellipse.ry) {
				this.logger.debug(`Dropped ellipse ${ellipse.id}: unequal radii`);
				continue;
			}
			circles.push({ cx: ellipse.cx, cy: ellipse.cy, radius: ellipse.rx, fill: fillOf(ellipse.fillColor) });
		}

		const arcs: SymbolArc[] = [];
		for (const arc of parsed.arcs) {
			const points = arcThreePoints(arc.path);
			if (!points) {
				this.logger.warn(`Dropped arc ${arc.id}: unsupported path "${arc.path}"`);
				continue;
			}
			arcs.push({ ...points, fill: fillOf(arc.fillColor) });
		}

		const polylines: SymbolPolyline[] = [
			...parsed.polylines.map(shape => polylineOf(shape, false)),
			...parsed.polygons.map(shape => polylineOf(shape, true)),
		];
		for (const path of parsed.paths) {
			const polyline = pathToPolyline(path);
			if (polyline)
				polylines.push(polyline);
			else
				this.logger.warn(`Dropped path ${path.id}: curves are not supported`);
		}

		const ys = pins.map(pin => pin.y - origin.y);
		return {
			info,
			originOffset: { x: origin.x, y: origin.y },
			pins,
			rectangles,
			circles,
			arcs,
			polylines,
			pinExtent: {
				yMin: ys.length > 0 ? Math.min(...ys) : 0,
				yMax: ys.length > 0 ? Math.max(...ys) : 0,
			},
			isFallback: false,
		};
	}

	private buildPin(pin: EasyEDAPin): SymbolPin {
		const number = (pin.settings.spiceNumber || pin.displayNumber.text).replaceAll(' ', '');
		return {
			number,
			name: pin.displayName.text.replaceAll(' ', ''),
			type: PIN_TYPE_MAP[pin.settings.electricalType],
			style: pinStyleOf(pin),
			x: pin.settings.x,
			y: pin.settings.y,
			rotation: pin.settings.rotation,
			length: pinLengthOf(pin.path.vector),
		};
	}

	/** Renders one `(symbol …)` record of a symbol library. */
	convertToSymbolEntry(model: SymbolModel, options: SymbolEntryOptions = {}): string {
		const id = options.symbolName ?? sanitizeSymbolId(model.info.name);
		const origin = model.originOffset;
		const x = (value: number) => formatNumber(toSymbolX(value, origin));
		const y = (value: number) => formatNumber(toSymbolY(value, origin));

		const lines: string[] = [
			`\t(symbol ${quote(id)}`,
			'\t\t(in_bom yes)',
			'\t\t(on_board yes)',
			...this.renderProperties(model, options.footprintLibName),
			`\t\t(symbol ${quote(`${id}_0_1`)}`,
		];

		for (const rect of model.rectangles) {
			const startX = toSymbolX(rect.x, origin);
			const startY = toSymbolY(rect.y, origin);
			lines.push(
				'\t\t\t(rectangle',
				`\t\t\t\t(start ${formatNumber(startX)} ${formatNumber(startY)})`,
				`\t\t\t\t(end ${formatNumber(startX + toDestinationLinear(rect.width))} ${formatNumber(startY - toDestinationLinear(rect.height))})`,
				`\t\t\t\t${strokeLine()}`,
				`\t\t\t\t(fill (type ${rect.fill}))`,
				'\t\t\t)',
			);
		}
		for (const circle of model.circles) {
			lines.push(
				'\t\t\t(circle',
				`\t\t\t\t(center ${x(circle.cx)} ${y(circle.cy)})`,
				`\t\t\t\t(radius ${formatNumber(toDestinationLinear(circle.radius))})`,
				`\t\t\t\t${strokeLine()}`,
				`\t\t\t\t(fill (type ${circle.fill}))`,
				'\t\t\t)',
			);
		}
		for (const arc of model.arcs) {
			lines.push(
				'\t\t\t(arc',
				`\t\t\t\t(start ${x(arc.start.x)} ${y(arc.start.y)})`,
				`\t\t\t\t(mid ${x(arc.mid.x)} ${y(arc.mid.y)})`,
				`\t\t\t\t(end ${x(arc.end.x)} ${y(arc.end.y)})`,
				`\t\t\t\t${strokeLine()}`,
				`\t\t\t\t(fill (type ${arc.fill}))`,
				'\t\t\t)',
			);
		}
		for (const polyline of model.polylines) {
			const pts = polyline.points.map(p => `(xy ${x(p.x)} ${y(p.y)})`).join(' ');
			lines.push(
				'\t\t\t(polyline',
				`\t\t\t\t(pts ${pts})`,
				`\t\t\t\t${strokeLine()}`,
				`\t\t\t\t(fill (type ${polyline.closed ? 'background' : 'none'}))`,
				'\t\t\t)',
			);
		}
		for (const pin of model.pins) {
			lines.push(
				`\t\t\t(pin ${pin.type} ${pin.style}`,
				`\t\t\t\t(at ${x(pin.x)} ${y(pin.y)} ${pinOrientation(pin.rotation)})`,
				`\t\t\t\t(length ${formatNumber(toDestinationLinear(pin.length))})`,
				`\t\t\t\t(name ${quote(applyPinNameStyle(pin.name))} (effects (font (size ${SYMBOL_PIN_NAME_SIZE} ${SYMBOL_PIN_NAME_SIZE}))))`,
				`\t\t\t\t(number ${quote(pin.number)} (effects (font (size ${SYMBOL_PIN_NUMBER_SIZE} ${SYMBOL_PIN_NUMBER_SIZE}))))`,
				'\t\t\t)',
			);
		}

		lines.push('\t\t)', '\t)');
		return `${lines.join('\n')}\n`;
	}

	private renderProperties(model: SymbolModel, footprintLibName?: string): string[] {
		// symbol Y points up, so the topmost pin has the smallest source Y
		const yHigh = -toDestinationLinear(model.pinExtent.yMin);
		const yLow = -toDestinationLinear(model.pinExtent.yMax);
		const { info } = model;
		const footprint = info.package && footprintLibName ? `${footprintLibName}:${info.package}` : info.package;

		const property = (key: string, value: string, id: number, posY: number, hide: boolean) =>
			`\t\t(property ${quote(key)} ${quote(value)} (id ${id}) (at 0 ${formatNumber(posY)} 0) (effects (font (size ${SYMBOL_PROPERTY_FONT_SIZE} ${SYMBOL_PROPERTY_FONT_SIZE}))${hide ? ' hide' : ''}))`;

		let offset = SYMBOL_FIELD_OFFSET_START;
		const out = [
			property('Reference', info.refPrefix, 0, yHigh + offset, false),
			property('Value', info.name, 1, yLow - offset, false),
		];
		const optional: Array<[string, string, number]> = [
			['Footprint', footprint, 2],
			['Datasheet', info.datasheet, 3],
			['LCSC', info.sourceId, 4],
			['Manufacturer', info.manufacturer, 5],
			['JLC Part', info.externalId, 6],
		];
		for (const [key, value, id] of optional) {
			if (!value)
				continue;
			offset += SYMBOL_FIELD_OFFSET_INCREMENT;
			out.push(property(key, value, id, yLow - offset, true));
		}
		return out;
	}
}
