/**
 * Field positions of the packed shape records.
 *
 * Indices count the `~`-separated tokens of a record with the type tag at 0,
 * so `PAD~RECT~…` has `shape` at 1. Pin groups (`^^`-separated) each get
 * their own table indexed within the group.
 */

export const PIN_GROUP_SEPARATOR = '^^';
export const FIELD_SEPARATOR = '~';

export const PIN_GROUPS = {
	settings: 0,
	startDot: 1,
	path: 2,
	name: 3,
	number: 4,
	invertedDot: 5,
	clockMark: 6,
} as const;

export const PIN_SETTINGS_FIELDS = {
	visible: 1,
	electricalType: 2,
	spiceNumber: 3,
	x: 4,
	y: 5,
	rotation: 6,
	id: 7,
	locked: 8,
} as const;

export const PIN_DOT_FIELDS = { x: 0, y: 1 } as const;

export const PIN_PATH_FIELDS = { vector: 0, color: 1 } as const;

export const PIN_LABEL_FIELDS = {
	visible: 0,
	x: 1,
	y: 2,
	rotation: 3,
	text: 4,
	anchor: 5,
	font: 6,
	size: 7,
} as const;

export const PIN_INVERTED_DOT_FIELDS = { visible: 0, x: 1, y: 2 } as const;

export const PIN_CLOCK_FIELDS = { visible: 0, vector: 1 } as const;

/** `R~x~y~rx~ry~width~height~strokeColor~strokeWidth~strokeStyle~fillColor~id~locked` */
export const RECT_FIELDS = {
	x: 1,
	y: 2,
	rx: 3,
	ry: 4,
	width: 5,
	height: 6,
	strokeColor: 7,
	strokeWidth: 8,
	strokeStyle: 9,
	fillColor: 10,
	id: 11,
	locked: 12,
} as const;

/** `R~x~y~width~height~strokeColor~strokeWidth~strokeStyle~fillColor~id~locked` (no corner radii). */
export const RECT_COMPACT_FIELDS = {
	x: 1,
	y: 2,
	width: 3,
	height: 4,
	strokeColor: 5,
	strokeWidth: 6,
	strokeStyle: 7,
	fillColor: 8,
	id: 9,
	locked: 10,
} as const;

/** Records with at least this many tokens carry corner radii. */
export const RECT_ROUNDED_MIN_TOKENS = 12;

export const CIRCLE_FIELDS = {
	cx: 1,
	cy: 2,
	radius: 3,
	strokeColor: 4,
	strokeWidth: 5,
	strokeStyle: 6,
	fillColor: 7,
	id: 8,
	locked: 9,
} as const;

export const ELLIPSE_FIELDS = {
	cx: 1,
	cy: 2,
	rx: 3,
	ry: 4,
	strokeColor: 5,
	strokeWidth: 6,
	strokeStyle: 7,
	fillColor: 8,
	id: 9,
	locked: 10,
} as const;

export const ARC_FIELDS = {
	path: 1,
	helperDots: 2,
	strokeColor: 3,
	strokeWidth: 4,
	strokeStyle: 5,
	fillColor: 6,
	id: 7,
	locked: 8,
} as const;

/** Shared by `PL` and `PG`. */
export const POLY_FIELDS = {
	points: 1,
	strokeColor: 2,
	strokeWidth: 3,
	strokeStyle: 4,
	fillColor: 5,
	id: 6,
	locked: 7,
} as const;

export const PATH_FIELDS = {
	path: 1,
	strokeColor: 2,
	strokeWidth: 3,
	strokeStyle: 4,
	fillColor: 5,
	id: 6,
	locked: 7,
} as const;

export const SYMBOL_TEXT_FIELDS = {
	mark: 1,
	x: 2,
	y: 3,
	rotation: 4,
	color: 5,
	font: 6,
	fontSize: 7,
	text: 12,
	visible: 13,
	id: 15,
} as const;

export const PAD_FIELDS = {
	shape: 1,
	centerX: 2,
	centerY: 3,
	width: 4,
	height: 5,
	layerId: 6,
	net: 7,
	number: 8,
	holeRadius: 9,
	points: 10,
	rotation: 11,
	id: 12,
	holeLength: 13,
	holePoints: 14,
	plated: 15,
	locked: 16,
} as const;

export const TRACK_FIELDS = {
	strokeWidth: 1,
	layerId: 2,
	net: 3,
	points: 4,
	id: 5,
	locked: 6,
} as const;

export const FOOTPRINT_CIRCLE_FIELDS = {
	cx: 1,
	cy: 2,
	radius: 3,
	strokeWidth: 4,
	layerId: 5,
	id: 6,
	locked: 7,
} as const;

export const FOOTPRINT_TEXT_FIELDS = {
	kind: 1,
	x: 2,
	y: 3,
	strokeWidth: 4,
	rotation: 5,
	mirror: 6,
	layerId: 7,
	net: 8,
	fontSize: 9,
	text: 10,
	path: 11,
	display: 12,
	id: 13,
} as const;

export const HOLE_FIELDS = {
	cx: 1,
	cy: 2,
	radius: 3,
	id: 4,
	locked: 5,
} as const;

export const FOOTPRINT_ARC_FIELDS = {
	strokeWidth: 1,
	layerId: 2,
	net: 3,
	path: 4,
	helperDots: 5,
	id: 6,
	locked: 7,
} as const;

export const FOOTPRINT_RECT_FIELDS = {
	x: 1,
	y: 2,
	width: 3,
	height: 4,
	layerId: 5,
	id: 6,
	locked: 7,
	strokeWidth: 8,
} as const;

/** Minimum token counts (tag included); shorter records are skipped. */
export const MIN_TOKENS = {
	R: 5,
	C: 4,
	E: 5,
	A: 2,
	PL: 2,
	PG: 2,
	PATH: 2,
	T: 13,
	PAD: 10,
	TRACK: 5,
	CIRCLE: 5,
	TEXT: 11,
	HOLE: 4,
	ARC: 5,
	RECT: 6,
	SVGNODE: 2,
} as const;

/** Pins are counted in `^^` groups; the clock group may be absent. */
export const PIN_MIN_GROUPS = 6;
