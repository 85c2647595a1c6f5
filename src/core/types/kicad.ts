import type { EasyEDAPadShape, PinRotation } from './easyeda';

/**
 * Intermediate models handed from the builders to the serializers.
 *
 * Coordinates stay in source units relative to the model's origin; the
 * serializers apply unit conversion, axis inversion and rotation phase.
 */

export interface Point {
	x: number;
	y: number;
}

export interface Vec3 {
	x: number;
	y: number;
	z: number;
}

export type KiPinType =
	| 'input'
	| 'output'
	| 'bidirectional'
	| 'tri_state'
	| 'passive'
	| 'free'
	| 'unspecified'
	| 'power_in'
	| 'power_out'
	| 'open_collector'
	| 'open_emitter'
	| 'no_connect';

export type KiPinStyle = 'line' | 'inverted' | 'clock' | 'inverted_clock';

export type KiFill = 'none' | 'outline' | 'background';

export interface SymbolInfo {
	name: string;
	refPrefix: string;
	package: string;
	manufacturer: string;
	datasheet: string;
	sourceId: string;
	externalId: string;
}

export interface SymbolPin {
	number: string;
	name: string;
	type: KiPinType;
	style: KiPinStyle;
	x: number;
	y: number;
	rotation: PinRotation;
	length: number;
}

export interface SymbolRect {
	x: number;
	y: number;
	width: number;
	height: number;
	fill: KiFill;
}

export interface SymbolCircle {
	cx: number;
	cy: number;
	radius: number;
	fill: KiFill;
}

export interface SymbolArc {
	start: Point;
	mid: Point;
	end: Point;
	fill: KiFill;
}

export interface SymbolPolyline {
	points: Point[];
	closed: boolean;
}

export interface SymbolModel {
	info: SymbolInfo;
	originOffset: Point;
	pins: SymbolPin[];
	rectangles: SymbolRect[];
	circles: SymbolCircle[];
	arcs: SymbolArc[];
	polylines: SymbolPolyline[];
	/** Pin vertical extent (source units, relative to origin, source Y axis). */
	pinExtent: { yMin: number; yMax: number };
	isFallback: boolean;
}

export interface ModelTransform {
	translation: Vec3;
	rotation: Vec3;
	scale: Vec3;
}

export interface Model3D {
	uuid: string;
	title: string;
	objData?: string;
	stepData?: Uint8Array;
	transform: ModelTransform;
}

export type ModelFileFormat = 'step' | 'obj';

export interface FootprintModelRef {
	/** Directory reference written into the footprint, e.g. `${KIPRJMOD}/lib.3dshapes`. */
	pathRef: string;
	name: string;
	format: ModelFileFormat;
	transform: ModelTransform;
}

export interface FootprintInfo {
	name: string;
	isSurfaceMount: boolean;
	bboxOriginX: number;
	bboxOriginY: number;
}

export interface FootprintPad {
	shape: EasyEDAPadShape;
	centerX: number;
	centerY: number;
	width: number;
	height: number;
	layerId: number;
	net: string;
	number: string;
	holeRadius: number;
	holeLength: number;
	polygonPoints: Point[];
	rotation: number;
}

export interface FootprintLine {
	start: Point;
	end: Point;
	width: number;
	layerId: number;
}

export interface FootprintCircle {
	cx: number;
	cy: number;
	radius: number;
	width: number;
	layerId: number;
}

export interface FootprintText {
	text: string;
	x: number;
	y: number;
	size: number;
	rotation: number;
	layerId: number;
	visible: boolean;
}

export interface FootprintHole {
	cx: number;
	cy: number;
	radius: number;
}

export interface FootprintArc {
	start: Point;
	mid: Point;
	end: Point;
	width: number;
	layerId: number;
}

export interface FootprintModel {
	info: FootprintInfo;
	pads: FootprintPad[];
	tracks: FootprintLine[];
	circles: FootprintCircle[];
	texts: FootprintText[];
	holes: FootprintHole[];
	arcs: FootprintArc[];
	model3D?: FootprintModelRef;
	/** Raw shape list, kept for the 3D model lookup. */
	shapes: string[];
}
