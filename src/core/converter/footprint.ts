import type { Logger } from '../../logger';
import type { EasyEDAComponentData, EasyEDAModelNode } from '../types/easyeda';
import type {
	FootprintArc,
	FootprintLine,
	FootprintModel,
	FootprintModelRef,
	FootprintPad,
	ModelFileFormat,
	ModelTransform,
	Point,
} from '../types/kicad';
import { getLogger } from '../../logger';
import {
	CUSTOM_PAD_ANCHOR_SIZE,
	CUSTOM_PAD_OUTLINE_WIDTH,
	DEFAULT_FOOTPRINT_LAYER,
	FOOTPRINT_LAYERS,
	KICAD_FOOTPRINT_VERSION,
	KICAD_GENERATOR,
	PAD_SHAPES,
} from '../constants/kicad';
import { MissingSectionError } from '../errors';
import { parseFootprintShapes } from '../parsers/easyeda-shapes';
import { arcThreePoints } from './svg-arc';
import { quote } from './symbol';
import { formatNumber, modelRotation, modelTranslation, toDestinationLinear } from './units';

const BACK_COPPER_LAYER = 2;
const DEFAULT_TEXT_SIZE_MM = 1;

export interface FootprintRenderOptions {
	/** Overrides the footprint name carried by the model. */
	name?: string;
}

export function layerName(layerId: number): string {
	return FOOTPRINT_LAYERS[layerId] ?? DEFAULT_FOOTPRINT_LAYER;
}

export function padLayers(pad: FootprintPad): string {
	if (pad.holeRadius > 0)
		return '"*.Cu" "*.Mask"';
	if (pad.layerId === BACK_COPPER_LAYER)
		return '"B.Cu" "B.Paste" "B.Mask"';
	return '"F.Cu" "F.Paste" "F.Mask"';
}

function pairs(values: readonly number[]): Point[] {
	const out: Point[] = [];
	for (let i = 0; i + 1 < values.length; i += 2)
		out.push({ x: values[i] ?? 0, y: values[i + 1] ?? 0 });
	return out;
}

function mm(value: number, digits = 3): string {
	return formatNumber(toDestinationLinear(value), digits);
}

function rectOutline(x: number, y: number, width: number, height: number, strokeWidth: number, layerId: number): FootprintLine[] {
	const corners: Point[] = [
		{ x, y },
		{ x: x + width, y },
		{ x: x + width, y: y + height },
		{ x, y: y + height },
	];
	return corners.map((start, i) => ({
		start,
		end: corners[(i + 1) % corners.length] ?? start,
		width: strokeWidth,
		layerId,
	}));
}

export class FootprintConverter {
	private readonly logger: Logger;

	constructor(logger: Logger = getLogger('footprint')) {
		this.logger = logger;
	}

	/**
	 * Decodes the footprint shapes of a component. Every coordinate comes
	 * back re-based on the header origin, still in source units.
	 */
	build(component: EasyEDAComponentData): FootprintModel {
		const footprint = component.footprint;
		if (!footprint)
			throw new MissingSectionError('footprint', 'packageDetail');

		const { x: ox, y: oy } = footprint.origin;
		const at = (x: number, y: number): Point => ({ x: x - ox, y: y - oy });
		const parsed = parseFootprintShapes(footprint.shape, this.logger);

		const pads: FootprintPad[] = parsed.pads.map(pad => ({
			shape: pad.shape,
			centerX: pad.centerX - ox,
			centerY: pad.centerY - oy,
			width: pad.width,
			height: pad.height,
			layerId: pad.layerId,
			net: pad.net,
			number: pad.number,
			holeRadius: pad.holeRadius,
			holeLength: pad.holeLength,
			polygonPoints: pairs(pad.polygonPoints).map(p => at(p.x, p.y)),
			rotation: pad.rotation,
		}));

		const tracks: FootprintLine[] = [];
		for (const track of parsed.tracks) {
			const points = pairs(track.points).map(p => at(p.x, p.y));
			for (let i = 1; i < points.length; i++) {
				const start = points[i - 1];
				const end = points[i];
				if (start && end)
					tracks.push({ start, end, width: track.strokeWidth, layerId: track.layerId });
			}
		}
		for (const rect of parsed.rects) {
			const origin = at(rect.x, rect.y);
			tracks.push(...rectOutline(origin.x, origin.y, rect.width, rect.height, rect.strokeWidth, rect.layerId));
		}

		const arcs: FootprintArc[] = [];
		for (const arc of parsed.arcs) {
			const points = arcThreePoints(arc.path);
			if (!points) {
				this.logger.warn(`Dropped footprint arc ${arc.id}: unsupported path "${arc.path}"`);
				continue;
			}
			arcs.push({
				start: at(points.start.x, points.start.y),
				mid: at(points.mid.x, points.mid.y),
				end: at(points.end.x, points.end.y),
				width: arc.strokeWidth,
				layerId: arc.layerId,
			});
		}

		return {
			info: {
				name: footprint.name,
				isSurfaceMount: footprint.isSurfaceMount,
				bboxOriginX: ox,
				bboxOriginY: oy,
			},
			pads,
			tracks,
			circles: parsed.circles.map(circle => ({
				cx: circle.cx - ox,
				cy: circle.cy - oy,
				radius: circle.radius,
				width: circle.strokeWidth,
				layerId: circle.layerId,
			})),
			texts: parsed.texts.map(text => ({
				text: text.text,
				x: text.x - ox,
				y: text.y - oy,
				size: text.fontSize,
				rotation: text.rotation,
				layerId: text.layerId,
				visible: text.visible,
			})),
			holes: parsed.holes.map(hole => ({ cx: hole.cx - ox, cy: hole.cy - oy, radius: hole.radius })),
			arcs,
			shapes: [...footprint.shape],
		};
	}

	/** Folds a resolved 3D model node into the footprint, re-based like every other coordinate. */
	attachModel(
		model: FootprintModel,
		node: EasyEDAModelNode,
		ref: { pathRef: string; name: string; format?: ModelFileFormat },
	): FootprintModel {
		const transform: ModelTransform = {
			translation: {
				x: node.originX - model.info.bboxOriginX,
				y: node.originY - model.info.bboxOriginY,
				z: node.z,
			},
			rotation: { ...node.rotation },
			scale: { x: 1, y: 1, z: 1 },
		};
		const model3D: FootprintModelRef = { pathRef: ref.pathRef, name: ref.name, format: ref.format ?? 'step', transform };
		return { ...model, model3D };
	}

	/** Renders a complete `.kicad_mod` document. */
	convert(model: FootprintModel, options: FootprintRenderOptions = {}): string {
		const name = options.name ?? model.info.name;
		const lines: string[] = [
			`(footprint ${quote(name)}`,
			`\t(version ${KICAD_FOOTPRINT_VERSION})`,
			`\t(generator ${KICAD_GENERATOR})`,
			'\t(layer "F.Cu")',
			`\t(attr ${model.info.isSurfaceMount ? 'smd' : 'through_hole'})`,
			'\t(fp_text reference "REF**" (at 0 -3) (layer "F.SilkS")',
			'\t\t(effects (font (size 1 1) (thickness 0.15)))',
			'\t)',
			`\t(fp_text value ${quote(name)} (at 0 3) (layer "F.Fab")`,
			'\t\t(effects (font (size 1 1) (thickness 0.15)))',
			'\t)',
		];

		for (const pad of model.pads)
			lines.push(...this.renderPad(pad));
		for (const hole of model.holes) {
			const d = mm(hole.radius * 2);
			lines.push(`\t(pad "" np_thru_hole circle (at ${mm(hole.cx)} ${mm(hole.cy)}) (size ${d} ${d}) (drill ${d}) (layers "*.Cu" "*.Mask"))`);
		}
		for (const line of model.tracks) {
			lines.push(`\t(fp_line (start ${mm(line.start.x)} ${mm(line.start.y)}) (end ${mm(line.end.x)} ${mm(line.end.y)}) (stroke (width ${mm(line.width)}) (type solid)) (layer ${quote(layerName(line.layerId))}))`);
		}
		for (const circle of model.circles) {
			lines.push(`\t(fp_circle (center ${mm(circle.cx)} ${mm(circle.cy)}) (end ${mm(circle.cx + circle.radius)} ${mm(circle.cy)}) (stroke (width ${mm(circle.width)}) (type solid)) (fill none) (layer ${quote(layerName(circle.layerId))}))`);
		}
		for (const arc of model.arcs) {
			lines.push(`\t(fp_arc (start ${mm(arc.start.x)} ${mm(arc.start.y)}) (mid ${mm(arc.mid.x)} ${mm(arc.mid.y)}) (end ${mm(arc.end.x)} ${mm(arc.end.y)}) (stroke (width ${mm(arc.width)}) (type solid)) (layer ${quote(layerName(arc.layerId))}))`);
		}
		for (const text of model.texts) {
			const size = text.size > 0 ? toDestinationLinear(text.size) : DEFAULT_TEXT_SIZE_MM;
			lines.push(
				`\t(fp_text user ${quote(text.text)} (at ${mm(text.x)} ${mm(text.y)} ${formatNumber(text.rotation, 1)}) (layer ${quote(layerName(text.layerId))})${text.visible ? '' : ' hide'}`,
				`\t\t(effects (font (size ${formatNumber(size, 3)} ${formatNumber(size, 3)}) (thickness ${formatNumber(size * 0.15, 3)})))`,
				'\t)',
			);
		}
		if (model.model3D)
			lines.push(...this.renderModel(model.model3D));

		lines.push(')');
		return `${lines.join('\n')}\n`;
	}

	private renderPad(pad: FootprintPad): string[] {
		const type = pad.holeRadius > 0 ? 'thru_hole' : 'smd';
		let shape: string = PAD_SHAPES[pad.shape];
		let width = mm(pad.width);
		let height = mm(pad.height);
		let rotation = pad.rotation;
		let primitives: string[] = [];

		if (shape === PAD_SHAPES.POLYGON) {
			if (pad.polygonPoints.length >= 2) {
				width = formatNumber(CUSTOM_PAD_ANCHOR_SIZE, 3);
				height = width;
				// primitive points already carry the pad's rotation
				rotation = 0;
				const pts = pad.polygonPoints
					.map(p => `(xy ${mm(p.x - pad.centerX)} ${mm(p.y - pad.centerY)})`)
					.join(' ');
				primitives = [
					'\t\t(zone_connect 2)',
					'\t\t(options (clearance outline) (anchor rect))',
					`\t\t(primitives (gr_poly (pts ${pts}) (width ${CUSTOM_PAD_OUTLINE_WIDTH})))`,
				];
			}
			else {
				this.logger.warn(`Pad ${pad.number}: polygon has fewer than two points, using a rect pad`);
				shape = PAD_SHAPES.RECT;
			}
		}

		const out = [
			`\t(pad ${quote(pad.number)} ${type} ${shape}`,
			`\t\t(at ${mm(pad.centerX)} ${mm(pad.centerY)} ${formatNumber(rotation, 1)})`,
			`\t\t(size ${width} ${height})`,
			`\t\t(layers ${padLayers(pad)})`,
		];
		if (pad.holeRadius > 0) {
			const diameter = pad.holeRadius * 2;
			out.push(pad.holeLength > 0
				? `\t\t(drill oval ${mm(diameter)} ${mm(pad.holeLength)})`
				: `\t\t(drill ${mm(diameter)})`);
		}
		out.push(...primitives, '\t)');
		return out;
	}

	private renderModel(ref: FootprintModelRef): string[] {
		const offset = modelTranslation(ref.transform.translation);
		const rotate = modelRotation(ref.transform.rotation);
		const { scale } = ref.transform;
		const xyz = (v: { x: number; y: number; z: number }) =>
			`(xyz ${formatNumber(v.x, 4)} ${formatNumber(v.y, 4)} ${formatNumber(v.z, 4)})`;
		return [
			`\t(model ${quote(`${ref.pathRef}/${ref.name}.${ref.format}`)}`,
			`\t\t(offset ${xyz(offset)})`,
			`\t\t(scale ${xyz(scale)})`,
			`\t\t(rotate ${xyz(rotate)})`,
			'\t)',
		];
	}
}
