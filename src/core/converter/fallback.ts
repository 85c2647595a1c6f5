import type { Logger } from '../../logger';
import type { PinRotation } from '../types/easyeda';
import type { SymbolInfo, SymbolModel, SymbolPin } from '../types/kicad';
import { getLogger } from '../../logger';
import { SYMBOL_PIN_LENGTH, SYMBOL_PIN_SPACING } from '../constants/kicad';
import { FIELD_SEPARATOR, PAD_FIELDS } from '../parsers/fields';
import { shapeTag } from '../parsers/easyeda-shapes';
import { fromDestinationLinear } from './units';

/** Body edge to first pin, millimetres. */
const BODY_MARGIN = 5.08;
const MIN_BODY_HEIGHT = 10.16;
const MIN_BODY_WIDTH = 12.7;
const DEFAULT_PIN_COUNT = 8;
const DUAL_INLINE_MAX_PINS = 8;
const SQUARE_UP_ABOVE_PINS = 50;

export interface FallbackSymbolOptions {
	info: SymbolInfo;
	/** Pad numbers of the footprint, used verbatim as pin numbers. */
	padNumbers?: readonly string[];
	pinCount?: number;
	logger?: Logger;
}

export interface FallbackLayout {
	left: number;
	bottom: number;
	right: number;
	top: number;
	width: number;
	height: number;
}

export function extractPinCountFromPackage(packageName: string): number | undefined {
	const suffix = /-(\d+)(?:_|$)/u.exec(packageName);
	if (suffix?.[1])
		return Number.parseInt(suffix[1], 10);
	const pins = /(\d+)[-_]?(?:pin|Pin|PIN)/u.exec(packageName);
	if (pins?.[1])
		return Number.parseInt(pins[1], 10);
	return undefined;
}

/** Non-empty pad numbers of the `PAD` records, in record order. */
export function extractPadNumbers(shapes: readonly unknown[]): string[] {
	const out: string[] = [];
	for (const shape of shapes) {
		if (typeof shape !== 'string' || shapeTag(shape) !== 'PAD')
			continue;
		const number = shape.split(FIELD_SEPARATOR)[PAD_FIELDS.number];
		if (number)
			out.push(number);
	}
	return out;
}

/**
 * Up to eight pins go left and right only. Above that, top and bottom get
 * `max(2, floor(n / 10))` each and the rest is split left/right, the odd
 * pin going left. Every pin starts one pin length outside the body.
 */
export function planFallbackLayout(pinCount: number): FallbackLayout {
	const horizontal = pinCount <= DUAL_INLINE_MAX_PINS ? 0 : Math.max(2, Math.floor(pinCount * 0.1));
	const left = Math.ceil((pinCount - 2 * horizontal) / 2);
	const right = pinCount - 2 * horizontal - left;

	let height = Math.max(MIN_BODY_HEIGHT, left * SYMBOL_PIN_SPACING + MIN_BODY_HEIGHT);
	let width = Math.max(MIN_BODY_WIDTH, horizontal * SYMBOL_PIN_SPACING + MIN_BODY_HEIGHT);
	if (pinCount > SQUARE_UP_ABOVE_PINS) {
		const floor = Math.max(height, width) * 0.5;
		height = Math.max(height, floor);
		width = Math.max(width, floor);
	}

	return { left, bottom: horizontal, right, top: horizontal, width, height };
}

interface MillimetrePin {
	number: string;
	x: number;
	y: number;
	rotation: PinRotation;
}

function horizontalStart(count: number, width: number): number {
	return -Math.min((count - 1) * SYMBOL_PIN_SPACING / 2, width / 2 - BODY_MARGIN);
}

/**
 * Places pins in millimetres, Y up. Rotations are source rotations: the
 * serializer adds the half turn, so a left pin (180) ends up pointing at
 * the body.
 */
function placePins(numbers: readonly string[], layout: FallbackLayout): MillimetrePin[] {
	const { width, height } = layout;
	const leftX = -width / 2 - SYMBOL_PIN_LENGTH;
	const rightX = width / 2 + SYMBOL_PIN_LENGTH;
	const pins: MillimetrePin[] = [];
	let next = 0;
	const take = (): string | undefined => numbers[next++];

	if (layout.bottom === 0 && layout.top === 0) {
		for (let i = 0; i < layout.left; i++) {
			const number = take();
			if (number !== undefined)
				pins.push({ number, x: leftX, y: height / 2 - (i + 1) * SYMBOL_PIN_SPACING - SYMBOL_PIN_SPACING, rotation: 180 });
		}
		for (let i = 0; i < layout.right; i++) {
			const number = take();
			if (number !== undefined)
				pins.push({ number, x: rightX, y: height / 2 - (i + 1) * SYMBOL_PIN_SPACING - SYMBOL_PIN_SPACING, rotation: 0 });
		}
		return pins;
	}

	const startY = Math.min((layout.left - 1) * SYMBOL_PIN_SPACING / 2, height / 2 - BODY_MARGIN);
	for (let i = 0; i < layout.left; i++) {
		const number = take();
		if (number !== undefined)
			pins.push({ number, x: leftX, y: startY - i * SYMBOL_PIN_SPACING, rotation: 180 });
	}
	const bottomX = horizontalStart(layout.bottom, width);
	for (let i = 0; i < layout.bottom; i++) {
		const number = take();
		if (number !== undefined)
			pins.push({ number, x: bottomX + i * SYMBOL_PIN_SPACING, y: -height / 2 - SYMBOL_PIN_LENGTH, rotation: 270 });
	}
	for (let i = 0; i < layout.right; i++) {
		const number = take();
		if (number !== undefined)
			pins.push({ number, x: rightX, y: startY - i * SYMBOL_PIN_SPACING, rotation: 0 });
	}
	const topX = horizontalStart(layout.top, width);
	for (let i = 0; i < layout.top; i++) {
		const number = take();
		if (number !== undefined)
			pins.push({ number, x: topX + i * SYMBOL_PIN_SPACING, y: height / 2 + SYMBOL_PIN_LENGTH, rotation: 90 });
	}
	return pins;
}

function resolvePinNumbers(options: FallbackSymbolOptions, logger: Logger): string[] {
	if (options.padNumbers && options.padNumbers.length > 0) {
		logger.info(`Fallback symbol for ${options.info.name} uses ${options.padNumbers.length} footprint pad numbers`);
		return [...options.padNumbers];
	}
	let count = options.pinCount ?? extractPinCountFromPackage(options.info.package);
	if (count === undefined || count <= 0) {
		logger.warn(`Could not determine pin count for ${options.info.name}, using ${DEFAULT_PIN_COUNT} pins`);
		count = DEFAULT_PIN_COUNT;
	}
	return Array.from({ length: count }, (_, i) => String(i + 1));
}

/**
 * Generic rectangular symbol for parts whose symbol carries no geometry.
 * The result is expressed in source units around a zero origin, like any
 * other built symbol.
 */
export function createFallbackSymbol(options: FallbackSymbolOptions): SymbolModel {
	const logger = options.logger ?? getLogger('fallback');
	const numbers = resolvePinNumbers(options, logger);
	const layout = planFallbackLayout(numbers.length);

	const pins: SymbolPin[] = placePins(numbers, layout).map(pin => ({
		number: pin.number,
		name: `Pin_${pin.number}`,
		type: 'passive',
		style: 'line',
		x: fromDestinationLinear(pin.x),
		y: -fromDestinationLinear(pin.y),
		rotation: pin.rotation,
		length: fromDestinationLinear(SYMBOL_PIN_LENGTH),
	}));

	const ys = pins.map(pin => pin.y);
	return {
		info: { ...options.info },
		originOffset: { x: 0, y: 0 },
		pins,
		rectangles: [{
			x: fromDestinationLinear(-layout.width / 2),
			y: -fromDestinationLinear(layout.height / 2),
			width: fromDestinationLinear(layout.width),
			height: fromDestinationLinear(layout.height),
			fill: 'background',
		}],
		circles: [],
		arcs: [],
		polylines: [],
		pinExtent: {
			yMin: ys.length > 0 ? Math.min(...ys) : 0,
			yMax: ys.length > 0 ? Math.max(...ys) : 0,
		},
		isFallback: true,
	};
}
