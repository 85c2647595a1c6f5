export const KICAD_SYMBOL_VERSION = '20211014';
export const KICAD_FOOTPRINT_VERSION = '20211014';
export const KICAD_GENERATOR = 'kicad_part_import';

/** Symbol geometry, millimetres. */
export const SYMBOL_PIN_LENGTH = 2.54;
export const SYMBOL_PIN_SPACING = 2.54;
export const SYMBOL_PIN_NAME_SIZE = 1.27;
export const SYMBOL_PIN_NUMBER_SIZE = 1.27;
export const SYMBOL_BOX_LINE_WIDTH = 0.254;
export const SYMBOL_PROPERTY_FONT_SIZE = 1.27;
export const SYMBOL_FIELD_OFFSET_START = 5.08;
export const SYMBOL_FIELD_OFFSET_INCREMENT = 2.54;

/** Custom pads are anchored on a pad this small; the polygon carries the shape. */
export const CUSTOM_PAD_ANCHOR_SIZE = 0.005;
export const CUSTOM_PAD_OUTLINE_WIDTH = 0.1;

export const FOOTPRINT_LAYERS: Readonly<Record<number, string>> = {
	1: 'F.Cu',
	2: 'B.Cu',
	3: 'F.SilkS',
	4: 'B.SilkS',
	5: 'F.Paste',
	6: 'B.Paste',
	7: 'F.Mask',
	8: 'B.Mask',
	10: 'Edge.Cuts',
	11: 'Edge.Cuts',
	12: 'Cmts.User',
	13: 'F.Fab',
	14: 'B.Fab',
	15: 'Dwgs.User',
};

export const DEFAULT_FOOTPRINT_LAYER = 'F.SilkS';

export const PAD_SHAPES = {
	RECT: 'rect',
	ELLIPSE: 'circle',
	OVAL: 'oval',
	POLYGON: 'custom',
} as const;
