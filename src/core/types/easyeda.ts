/**
 * Decoded EasyEDA (standard editor) shape records.
 *
 * Every geometric field stays in source units (1 unit = 10 mil) and in the
 * source coordinate system until a converter applies the transforms in
 * `converter/units.ts`.
 */

export type DecodeResult<T> =
	| { ok: true; value: T }
	| { ok: false; reason: string };

export interface SkippedShape {
	tag: string;
	index: number;
	reason: string;
}

export type EasyEDAPinType = 'unspecified' | 'input' | 'output' | 'bidirectional' | 'power';

export type PinRotation = 0 | 90 | 180 | 270;

// ---------------- symbol ----------------

export interface EasyEDAPinSettings {
	visible: boolean;
	electricalType: EasyEDAPinType;
	spiceNumber: string;
	x: number;
	y: number;
	rotation: PinRotation;
	id: string;
	locked: boolean;
}

export interface EasyEDAPin {
	settings: EasyEDAPinSettings;
	startDot: { x: number; y: number };
	path: { vector: string; color: string };
	displayName: {
		visible: boolean;
		x: number;
		y: number;
		rotation: number;
		text: string;
		anchor: string;
		font: string;
		size: number;
	};
	displayNumber: {
		visible: boolean;
		x: number;
		y: number;
		rotation: number;
		text: string;
	};
	invertedDot: { visible: boolean; x: number; y: number };
	clockMark: { visible: boolean; vector: string };
}

export interface EasyEDAStroke {
	strokeColor: string;
	strokeWidth: number;
	strokeStyle: string;
	fillColor: string;
	id: string;
	locked: boolean;
}

export interface EasyEDARectangle extends EasyEDAStroke {
	x: number;
	y: number;
	rx: number;
	ry: number;
	width: number;
	height: number;
}

export interface EasyEDACircle extends EasyEDAStroke {
	cx: number;
	cy: number;
	radius: number;
}

export interface EasyEDAEllipse extends EasyEDAStroke {
	cx: number;
	cy: number;
	rx: number;
	ry: number;
}

export interface EasyEDAArc extends EasyEDAStroke {
	path: string;
	helperDots: string;
}

export interface EasyEDAPolyline extends EasyEDAStroke {
	points: string;
}

export interface EasyEDAPath extends EasyEDAStroke {
	path: string;
}

export interface EasyEDASymbolText {
	mark: string;
	x: number;
	y: number;
	rotation: number;
	color: string;
	fontSize: number;
	text: string;
	id: string;
}

export interface ParsedSymbolShapes {
	pins: EasyEDAPin[];
	rectangles: EasyEDARectangle[];
	circles: EasyEDACircle[];
	ellipses: EasyEDAEllipse[];
	arcs: EasyEDAArc[];
	polylines: EasyEDAPolyline[];
	polygons: EasyEDAPolyline[];
	paths: EasyEDAPath[];
	texts: EasyEDASymbolText[];
	skipped: SkippedShape[];
	ignored: number;
}

// ---------------- footprint ----------------

export type EasyEDAPadShape = 'RECT' | 'ELLIPSE' | 'OVAL' | 'POLYGON';

export interface EasyEDAPad {
	shape: EasyEDAPadShape;
	centerX: number;
	centerY: number;
	width: number;
	height: number;
	layerId: number;
	net: string;
	number: string;
	holeRadius: number;
	/** Flat `x y x y …` list, source units, absolute. */
	polygonPoints: number[];
	rotation: number;
	id: string;
	holeLength: number;
	plated: boolean;
}

export interface EasyEDATrack {
	strokeWidth: number;
	layerId: number;
	net: string;
	/** Flat `x y x y …` list. */
	points: number[];
	id: string;
}

export interface EasyEDAFootprintCircle {
	cx: number;
	cy: number;
	radius: number;
	strokeWidth: number;
	layerId: number;
	id: string;
}

export interface EasyEDAFootprintText {
	kind: string;
	x: number;
	y: number;
	strokeWidth: number;
	rotation: number;
	mirror: boolean;
	layerId: number;
	fontSize: number;
	text: string;
	visible: boolean;
	id: string;
}

export interface EasyEDAHole {
	cx: number;
	cy: number;
	radius: number;
	id: string;
}

export interface EasyEDAFootprintArc {
	strokeWidth: number;
	layerId: number;
	path: string;
	id: string;
}

export interface EasyEDAFootprintRect {
	x: number;
	y: number;
	width: number;
	height: number;
	layerId: number;
	strokeWidth: number;
	id: string;
}

export interface EasyEDAModelNode {
	uuid: string;
	title: string;
	/** `c_origin` in source units. */
	originX: number;
	originY: number;
	z: number;
	rotation: { x: number; y: number; z: number };
}

export interface ParsedFootprintShapes {
	pads: EasyEDAPad[];
	tracks: EasyEDATrack[];
	circles: EasyEDAFootprintCircle[];
	texts: EasyEDAFootprintText[];
	holes: EasyEDAHole[];
	arcs: EasyEDAFootprintArc[];
	rects: EasyEDAFootprintRect[];
	skipped: SkippedShape[];
	ignored: number;
}

// ---------------- component ----------------

export interface EasyEDAComponentInfo {
	name: string;
	prefix: string;
	package: string;
	lcscId?: string;
	jlcId?: string;
	manufacturer?: string;
	description?: string;
	datasheet?: string;
}

export interface EasyEDAComponentData {
	info: EasyEDAComponentInfo;
	symbol?: {
		origin: { x: number; y: number };
		shape: string[];
	};
	footprint?: {
		name: string;
		isSurfaceMount: boolean;
		origin: { x: number; y: number };
		shape: string[];
	};
}
