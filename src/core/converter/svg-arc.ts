import type { Point } from '../types/kicad';

export interface SvgArcPath {
	start: Point;
	rx: number;
	ry: number;
	xAxisRotation: number;
	largeArc: boolean;
	sweep: boolean;
	end: Point;
}

export interface CenterArc {
	cx: number;
	cy: number;
	rx: number;
	ry: number;
	/** Degrees. */
	startAngle: number;
	/** Degrees, signed; positive follows the sweep flag. */
	extent: number;
}

/** Parses `M sx sy A rx ry rot large sweep ex ey`; anything else yields undefined. */
export function parseSvgArcPath(path: string): SvgArcPath | undefined {
	const match = /^M\s*([-\d.\s]+)A\s*([-\d.\s]+)$/u.exec(path.replace(/[,\s]+/gu, ' ').trim());
	if (!match)
		return undefined;
	const head = (match[1] ?? '').trim().split(' ').map(Number);
	const arc = (match[2] ?? '').trim().split(' ').map(Number);
	if (head.length < 2 || arc.length < 7 || [...head, ...arc].some(n => !Number.isFinite(n)))
		return undefined;
	const [sx = 0, sy = 0] = head;
	const [rx = 0, ry = 0, rot = 0, large = 0, sweep = 0, ex = 0, ey = 0] = arc;
	return {
		start: { x: sx, y: sy },
		rx,
		ry,
		xAxisRotation: rot,
		largeArc: large === 1,
		sweep: sweep === 1,
		end: { x: ex, y: ey },
	};
}

function angleBetween(ux: number, uy: number, vx: number, vy: number): number {
	const sign = ux * vy - uy * vx < 0 ? -1 : 1;
	const dot = ux * vx + uy * vy;
	const len = Math.hypot(ux, uy) * Math.hypot(vx, vy);
	const cos = Math.min(1, Math.max(-1, dot / len));
	return sign * Math.acos(cos) * 180 / Math.PI;
}

/** Endpoint to center parameterization of an SVG elliptical arc. */
export function computeArc(arc: SvgArcPath): CenterArc | undefined {
	const { start, end } = arc;
	let rx = Math.abs(arc.rx);
	let ry = Math.abs(arc.ry);
	if (rx === 0 || ry === 0 || (start.x === end.x && start.y === end.y))
		return undefined;

	const phi = arc.xAxisRotation * Math.PI / 180;
	const cosPhi = Math.cos(phi);
	const sinPhi = Math.sin(phi);
	const dx = (start.x - end.x) / 2;
	const dy = (start.y - end.y) / 2;
	const x1 = cosPhi * dx + sinPhi * dy;
	const y1 = -sinPhi * dx + cosPhi * dy;

	// radii too small to span the endpoints are scaled up
	const lambda = (x1 * x1) / (rx * rx) + (y1 * y1) / (ry * ry);
	if (lambda > 1) {
		rx *= Math.sqrt(lambda);
		ry *= Math.sqrt(lambda);
	}

	const num = rx * rx * ry * ry - rx * rx * y1 * y1 - ry * ry * x1 * x1;
	const den = rx * rx * y1 * y1 + ry * ry * x1 * x1;
	let coef = Math.sqrt(Math.max(0, num / den));
	if (arc.largeArc === arc.sweep)
		coef = -coef;
	const cx1 = coef * (rx * y1) / ry;
	const cy1 = coef * -(ry * x1) / rx;

	const cx = cosPhi * cx1 - sinPhi * cy1 + (start.x + end.x) / 2;
	const cy = sinPhi * cx1 + cosPhi * cy1 + (start.y + end.y) / 2;

	const ux = (x1 - cx1) / rx;
	const uy = (y1 - cy1) / ry;
	const vx = (-x1 - cx1) / rx;
	const vy = (-y1 - cy1) / ry;
	const startAngle = angleBetween(1, 0, ux, uy);
	let extent = angleBetween(ux, uy, vx, vy) % 360;
	if (!arc.sweep && extent > 0)
		extent -= 360;
	else if (arc.sweep && extent < 0)
		extent += 360;

	return { cx, cy, rx, ry, startAngle, extent };
}

export function pointOnArc(center: CenterArc, angle: number, xAxisRotation = 0): Point {
	const theta = angle * Math.PI / 180;
	const phi = xAxisRotation * Math.PI / 180;
	const x = center.rx * Math.cos(theta);
	const y = center.ry * Math.sin(theta);
	return {
		x: center.cx + x * Math.cos(phi) - y * Math.sin(phi),
		y: center.cy + x * Math.sin(phi) + y * Math.cos(phi),
	};
}

/** Start, midpoint and end of an SVG arc path, in the path's own coordinates. */
export function arcThreePoints(path: string): { start: Point; mid: Point; end: Point } | undefined {
	const arc = parseSvgArcPath(path);
	if (!arc)
		return undefined;
	const center = computeArc(arc);
	if (!center)
		return undefined;
	return {
		start: arc.start,
		mid: pointOnArc(center, center.startAngle + center.extent / 2, arc.xAxisRotation),
		end: arc.end,
	};
}
