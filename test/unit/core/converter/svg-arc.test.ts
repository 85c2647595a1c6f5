import { describe, expect, it } from 'vitest';
import { arcThreePoints, computeArc, parseSvgArcPath } from '../../../../src/core/converter/svg-arc';

describe('parseSvgArcPath', () => {
	it('reads the move and arc commands', () => {
		expect(parseSvgArcPath('M 0 0 A 10 10 0 0 1 20 0')).toEqual({
			start: { x: 0, y: 0 },
			rx: 10,
			ry: 10,
			xAxisRotation: 0,
			largeArc: false,
			sweep: true,
			end: { x: 20, y: 0 },
		});
	});

	it('accepts comma separated numbers', () => {
		expect(parseSvgArcPath('M0,0 A10,10,0,0,1,20,0')?.end).toEqual({ x: 20, y: 0 });
	});

	it('rejects other commands', () => {
		expect(parseSvgArcPath('M 0 0 L 10 10')).toBeUndefined();
		expect(parseSvgArcPath('M 0 0 A 10 10 0 0 1 20')).toBeUndefined();
	});
});

describe('computeArc', () => {
	it('finds the center of a half circle', () => {
		const arc = parseSvgArcPath('M 0 0 A 10 10 0 0 1 20 0');
		expect(arc).toBeDefined();
		const center = arc && computeArc(arc);
		expect(center?.cx).toBeCloseTo(10, 9);
		expect(center?.cy).toBeCloseTo(0, 9);
		expect(center?.startAngle).toBeCloseTo(180, 9);
		expect(center?.extent).toBeCloseTo(180, 9);
	});

	it('scales radii that cannot span the endpoints', () => {
		const arc = parseSvgArcPath('M 0 0 A 5 5 0 0 1 20 0');
		const center = arc && computeArc(arc);
		expect(center?.rx).toBeCloseTo(10, 9);
	});

	it('rejects degenerate arcs', () => {
		const arc = parseSvgArcPath('M 5 5 A 10 10 0 0 1 5 5');
		expect(arc && computeArc(arc)).toBeUndefined();
	});
});

describe('arcThreePoints', () => {
	it('puts the midpoint halfway along the sweep', () => {
		const points = arcThreePoints('M 0 0 A 10 10 0 0 1 20 0');
		expect(points?.start).toEqual({ x: 0, y: 0 });
		expect(points?.end).toEqual({ x: 20, y: 0 });
		expect(points?.mid.x).toBeCloseTo(10, 9);
		expect(points?.mid.y).toBeCloseTo(-10, 9);
	});

	it('follows the opposite sweep', () => {
		const points = arcThreePoints('M 0 0 A 10 10 0 0 0 20 0');
		expect(points?.mid.x).toBeCloseTo(10, 9);
		expect(points?.mid.y).toBeCloseTo(10, 9);
	});
});
