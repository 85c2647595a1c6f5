import type { PinRotation } from '../types/easyeda';
import type { Point, Vec3 } from '../types/kicad';

/** One source unit is 10 mil; one mil is 0.0254 mm. */
export const SOURCE_UNIT_TO_MM = 10 * 0.0254;

export function toDestinationLinear(value: number): number {
	return value * SOURCE_UNIT_TO_MM;
}

export function fromDestinationLinear(mm: number): number {
	return mm / SOURCE_UNIT_TO_MM;
}

export function toSymbolX(x: number, origin: Point): number {
	return toDestinationLinear(x - origin.x);
}

/** Symbol space has Y pointing up, the source has it pointing down. */
export function toSymbolY(y: number, origin: Point): number {
	return -toDestinationLinear(y - origin.y);
}

/**
 * The source rotates pins around their outer end, KiCad around the end that
 * touches the body, hence the half turn.
 */
export function pinOrientation(rotation: number): number {
	return normalizeAngle(rotation + 180);
}

export function normalizeAngle(angle: number): number {
	return ((angle % 360) + 360) % 360;
}

export function toPinRotation(value: number): PinRotation {
	const snapped = normalizeAngle(Math.round(value / 90) * 90);
	switch (snapped) {
		case 90:
			return 90;
		case 180:
			return 180;
		case 270:
			return 270;
		default:
			return 0;
	}
}

export function modelTranslation(translation: Vec3): Vec3 {
	return {
		x: toDestinationLinear(translation.x),
		y: -toDestinationLinear(translation.y),
		z: -toDestinationLinear(translation.z),
	};
}

export function modelRotation(rotation: Vec3): Vec3 {
	return {
		x: normalizeAngle(360 - rotation.x),
		y: normalizeAngle(360 - rotation.y),
		z: normalizeAngle(360 - rotation.z),
	};
}

/** Fixed-precision rendering without a negative zero. */
export function formatNumber(value: number, digits = 2): string {
	const text = value.toFixed(digits);
	return Number.parseFloat(text) === 0 ? (0).toFixed(digits) : text;
}
