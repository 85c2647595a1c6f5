import type { EasyEDAComponentData } from '../core/types/easyeda';
import type { Logger } from '../logger';
import type { ExtractedHeadAndShape } from './librarySource';
import { z } from 'zod';
import { FetchError } from '../core/errors';
import { isRecord } from '../core/parsers/utils';
import { getLogger } from '../logger';
import { extractHeadAndShape } from './librarySource';

/** `lcsc` is either the bare part number or an object carrying it. */
const lcscSchema = z.union([
	z.string(),
	z.number().transform(String),
	z.object({
		number: z.string().optional(),
		url: z.string().optional(),
	}).passthrough(),
]);

export const cadDataSchema = z.object({
	title: z.string().optional(),
	description: z.string().optional(),
	datasheet: z.string().optional(),
	manufacturer: z.string().optional(),
	lcsc: lcscSchema.optional(),
	SMT: z.union([z.boolean(), z.number(), z.string()]).optional(),
	dataStr: z.unknown().optional(),
	packageDetail: z.object({
		title: z.string().optional(),
		dataStr: z.unknown().optional(),
	}).passthrough().optional(),
}).passthrough();

export type CadData = z.infer<typeof cadDataSchema>;

export function parseCadData(value: unknown): CadData {
	const result = cadDataSchema.safeParse(value);
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue?.path.join('.') || '<root>';
		throw new FetchError(`Malformed CAD data at ${where}: ${issue?.message ?? 'invalid'}`);
	}
	return result.data;
}

function toNumber(value: unknown, fallback = 0): number {
	const n = typeof value === 'number' ? value : Number.parseFloat(String(value ?? ''));
	return Number.isFinite(n) ? n : fallback;
}

function toStringValue(value: unknown): string | undefined {
	return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function toBoolean(value: unknown): boolean {
	if (typeof value === 'boolean')
		return value;
	if (typeof value === 'number')
		return value !== 0;
	return typeof value === 'string' && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

export function getHeadNumber(head: Record<string, unknown>, key: 'x' | 'y'): number {
	const raw = head[key] ?? (key === 'x' ? head.originX : head.originY);
	return toNumber(raw);
}

export function getCParaString(head: Record<string, unknown>, key: string): string | undefined {
	const cPara = head.c_para;
	return isRecord(cPara) ? toStringValue(cPara[key]) : undefined;
}

export function lcscNumberOf(cadData: CadData): string | undefined {
	const { lcsc } = cadData;
	if (typeof lcsc === 'string')
		return toStringValue(lcsc);
	return toStringValue(lcsc?.number);
}

function datasheetOf(cadData: CadData): string | undefined {
	if (cadData.datasheet)
		return toStringValue(cadData.datasheet);
	const { lcsc } = cadData;
	return typeof lcsc === 'object' ? toStringValue(lcsc.url) : undefined;
}

function tryExtract(source: unknown, section: string, logger: Logger): ExtractedHeadAndShape | undefined {
	if (source === undefined || source === null)
		return undefined;
	try {
		return extractHeadAndShape(source);
	}
	catch (err) {
		logger.warn(`Ignoring unreadable ${section}: ${err instanceof Error ? err.message : String(err)}`);
		return undefined;
	}
}

export interface ComponentDataOptions {
	/** Name used when neither the symbol header nor the title provide one. */
	fallbackName?: string;
	logger?: Logger;
}

/**
 * Normalizes a CAD payload into the shape the converters consume. Absent
 * or unreadable sections stay absent; the converters report them.
 */
export function buildComponentData(cadData: CadData, options: ComponentDataOptions = {}): EasyEDAComponentData {
	const logger = options.logger ?? getLogger('payload');
	const symbolDoc = tryExtract(cadData.dataStr, 'dataStr', logger);
	const footprintDoc = tryExtract(cadData.packageDetail?.dataStr, 'packageDetail.dataStr', logger);
	const symbolHead = symbolDoc?.head ?? {};
	const footprintHead = footprintDoc?.head ?? {};

	const name = getCParaString(symbolHead, 'name')
		?? toStringValue(cadData.title)
		?? options.fallbackName
		?? 'Unknown';
	const footprintName = toStringValue(cadData.packageDetail?.title)
		?? getCParaString(footprintHead, 'package')
		?? `${name}_Footprint`;

	const data: EasyEDAComponentData = {
		info: {
			name,
			prefix: getCParaString(symbolHead, 'pre') ?? 'U',
			package: getCParaString(symbolHead, 'package') ?? footprintName,
			lcscId: lcscNumberOf(cadData),
			jlcId: getCParaString(symbolHead, 'BOM_JLCPCB Part Class'),
			manufacturer: getCParaString(symbolHead, 'BOM_Manufacturer') ?? toStringValue(cadData.manufacturer),
			description: toStringValue(cadData.description),
			datasheet: datasheetOf(cadData),
		},
	};

	if (symbolDoc) {
		data.symbol = {
			origin: { x: getHeadNumber(symbolHead, 'x'), y: getHeadNumber(symbolHead, 'y') },
			shape: symbolDoc.shape,
		};
	}
	if (footprintDoc) {
		data.footprint = {
			name: footprintName,
			isSurfaceMount: toBoolean(cadData.SMT),
			origin: { x: getHeadNumber(footprintHead, 'x'), y: getHeadNumber(footprintHead, 'y') },
			shape: footprintDoc.shape,
		};
	}
	return data;
}
