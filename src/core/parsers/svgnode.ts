import type { Logger } from '../../logger';
import type { DecodeResult, EasyEDAModelNode } from '../types/easyeda';
import { getLogger } from '../../logger';
import { FIELD_SEPARATOR, MIN_TOKENS } from './fields';
import { isRecord, parseNumberList, safeParseFloat } from './utils';

const SVGNODE_TAG = 'SVGNODE';

function stringAttr(attrs: Record<string, unknown>, key: string): string {
	const value = attrs[key];
	if (typeof value === 'string')
		return value;
	if (typeof value === 'number' && Number.isFinite(value))
		return String(value);
	return '';
}

/**
 * `SVGNODE~{json}`: the JSON may itself contain `~`, so everything after the
 * first separator is the payload.
 */
export function decodeSvgNode(record: string): DecodeResult<EasyEDAModelNode> {
	const idx = record.indexOf(FIELD_SEPARATOR);
	if (idx < 0 || record.split(FIELD_SEPARATOR).length < MIN_TOKENS.SVGNODE)
		return { ok: false, reason: 'SVGNODE record has no payload' };

	let payload: unknown;
	try {
		payload = JSON.parse(record.slice(idx + 1));
	}
	catch (err) {
		return { ok: false, reason: `SVGNODE payload is not JSON: ${err instanceof Error ? err.message : String(err)}` };
	}
	if (!isRecord(payload) || !isRecord(payload.attrs))
		return { ok: false, reason: 'SVGNODE payload has no attrs' };

	const attrs = payload.attrs;
	const uuid = stringAttr(attrs, 'uuid').trim();
	if (!uuid)
		return { ok: false, reason: 'SVGNODE attrs carry no uuid' };

	const [originX = 0, originY = 0] = parseNumberList(stringAttr(attrs, 'c_origin'));
	const [rx = 0, ry = 0, rz = 0] = parseNumberList(stringAttr(attrs, 'c_rotation'));
	return {
		ok: true,
		value: {
			uuid,
			title: stringAttr(attrs, 'title') || 'model',
			originX,
			originY,
			z: safeParseFloat(stringAttr(attrs, 'z')),
			rotation: { x: rx, y: ry, z: rz },
		},
	};
}

/** First usable 3D model node in a raw footprint shape list. */
export function findModel3DReference(shapes: readonly unknown[], logger: Logger = getLogger('parser')): EasyEDAModelNode | undefined {
	for (const shape of shapes) {
		if (typeof shape !== 'string' || !shape.startsWith(`${SVGNODE_TAG}${FIELD_SEPARATOR}`))
			continue;
		const result = decodeSvgNode(shape);
		if (result.ok)
			return result.value;
		logger.warn(`Skipped SVGNODE shape: ${result.reason}`);
	}
	logger.debug('No 3D model reference in footprint shapes');
	return undefined;
}
