import type { EasyEDAComponentData, EasyEDAModelNode } from '../core/types/easyeda';
import type { Logger } from '../logger';
import type { LibraryPaths } from './libraryLayout';
import type { ModelFiles } from './modelLibrary';
import type { ArtifactStep, AssetClient, ConversionResult, ConversionStatus, ConvertOptions, StepFailure } from './types';
import { basename, dirname } from 'node:path';
import { DEFAULT_MODEL_PATH_VAR } from '../config';
import { extractPadNumbers } from '../core/converter/fallback';
import { FootprintConverter } from '../core/converter/footprint';
import { sanitizeSymbolId, SymbolConverter } from '../core/converter/symbol';
import { ConversionError, FetchError, MissingSectionError } from '../core/errors';
import { findModel3DReference } from '../core/parsers/svgnode';
import { getLogger } from '../logger';
import { buildComponentData, parseCadData } from './convert';
import { exportFootprintToLibrary } from './footprintLibrary';
import { LcscClient } from './lcsc';
import { libraryPaths } from './libraryLayout';
import { exportModelFiles, modelWriteSucceeded } from './modelLibrary';
import { exportSymbolToLibrary } from './symbolLibrary';
import { ALL_STEPS } from './types';
import { compactError, errorToMessage, normalizeLcscId, sanitizeFileName } from './utils';

interface ModelAssets {
	node: EasyEDAModelNode;
	files: ModelFiles;
}

interface ConversionContext {
	component: EasyEDAComponentData;
	paths: LibraryPaths;
	libName: string;
	footprintFileName: string;
	modelFileName: string;
	modelPathRef: string;
	overwrite: boolean;
	logger: Logger;
}

function summarize(requested: readonly ArtifactStep[], outcome: Record<ArtifactStep, boolean>): ConversionStatus {
	const okCount = requested.filter(step => outcome[step]).length;
	if (okCount === requested.length)
		return 'success';
	return okCount === 0 ? 'failed' : 'partial';
}

async function fetchModelAssets(
	component: EasyEDAComponentData,
	client: AssetClient | undefined,
	logger: Logger,
): Promise<ModelAssets | undefined> {
	if (!component.footprint)
		throw new MissingSectionError('model', 'packageDetail');

	const node = findModel3DReference(component.footprint.shape, logger);
	if (!node) {
		logger.info(`${component.info.name}: no 3D model reference`);
		return undefined;
	}
	if (!client)
		throw new ConversionError('model', `No asset client to download 3D model ${node.uuid}`);

	const objData = await client.fetchModelMesh(node.uuid);
	const stepData = await client.fetchModelSolid(node.uuid);
	if (objData === undefined && stepData === undefined)
		throw new ConversionError('model', `3D model ${node.uuid} could not be downloaded`);

	return { node, files: { objData, stepData } };
}

async function exportSymbol(ctx: ConversionContext): Promise<void> {
	const { component } = ctx;
	const footprint = component.footprint;
	const converter = new SymbolConverter(ctx.logger);
	// point the Footprint property at the file the footprint step writes
	const model = converter.build(
		footprint ? { ...component, info: { ...component.info, package: ctx.footprintFileName } } : component,
		{ padNumbers: footprint ? extractPadNumbers(footprint.shape) : undefined },
	);
	const symbolId = sanitizeSymbolId(model.info.name);
	const entry = converter.convertToSymbolEntry(model, { symbolName: symbolId, footprintLibName: ctx.libName });
	await exportSymbolToLibrary(ctx.paths.symbolLibrary, entry, symbolId, { overwrite: ctx.overwrite, logger: ctx.logger });
}

async function exportFootprint(ctx: ConversionContext, assets: ModelAssets | undefined): Promise<void> {
	const converter = new FootprintConverter(ctx.logger);
	let model = converter.build(ctx.component);
	if (assets) {
		// reference the solid when there is one, otherwise the mesh that was written
		const format = assets.files.stepData !== undefined ? 'step' : 'obj';
		model = converter.attachModel(model, assets.node, { pathRef: ctx.modelPathRef, name: ctx.modelFileName, format });
	}
	const content = converter.convert(model, { name: ctx.footprintFileName });
	await exportFootprintToLibrary(ctx.paths.footprintDir, ctx.footprintFileName, content, { overwrite: ctx.overwrite, logger: ctx.logger });
}

async function exportModel(ctx: ConversionContext, assets: ModelAssets | undefined): Promise<void> {
	if (!assets)
		return;
	const result = await exportModelFiles(ctx.paths.modelDir, ctx.modelFileName, assets.files, { overwrite: ctx.overwrite, logger: ctx.logger });
	if (!modelWriteSucceeded(result))
		throw new ConversionError('model', `No 3D file written for ${ctx.modelFileName}`);
}

/**
 * Converts one CAD payload into `<outputBasePath>.kicad_sym`,
 * `<outputBasePath>.pretty/` and `<outputBasePath>.3dshapes/`. Steps fail
 * independently; a malformed payload throws a `FetchError`.
 */
export async function convert(cadData: unknown, outputBasePath: string, options: ConvertOptions = {}): Promise<ConversionResult> {
	const logger = options.logger ?? getLogger('convert');
	const requested = options.steps ?? ALL_STEPS;
	const payload = parseCadData(cadData);
	const component = buildComponentData(payload, { logger });

	const baseName = basename(outputBasePath);
	const libName = options.footprintLibName ?? baseName;
	const ctx: ConversionContext = {
		component,
		paths: libraryPaths(dirname(outputBasePath), baseName),
		libName,
		footprintFileName: sanitizeFileName(component.footprint?.name ?? `${component.info.name}_Footprint`),
		modelFileName: sanitizeFileName(component.info.name),
		modelPathRef: `${options.modelPathVar ?? DEFAULT_MODEL_PATH_VAR}/${baseName}.3dshapes`,
		overwrite: options.overwrite ?? true,
		logger,
	};

	const outcome: Record<ArtifactStep, boolean> = { symbol: false, footprint: false, model: false };
	const failures: StepFailure[] = [];
	const fail = (step: ArtifactStep, err: unknown): void => {
		failures.push({ step, message: compactError(err) });
		logger.error(`${component.info.name}: ${step} step failed: ${errorToMessage(err)}`);
	};

	// the model is fetched before any file is touched so the footprint can reference it
	let assets: ModelAssets | undefined;
	let modelError: unknown;
	if (requested.includes('model')) {
		try {
			assets = await fetchModelAssets(component, options.client, logger);
		}
		catch (err) {
			modelError = err;
		}
	}

	if (requested.includes('symbol')) {
		try {
			await exportSymbol(ctx);
			outcome.symbol = true;
		}
		catch (err) {
			fail('symbol', err);
		}
	}

	if (requested.includes('footprint')) {
		try {
			await exportFootprint(ctx, assets);
			outcome.footprint = true;
		}
		catch (err) {
			fail('footprint', err);
		}
	}

	if (requested.includes('model')) {
		try {
			if (modelError !== undefined)
				throw modelError;
			await exportModel(ctx, assets);
			outcome.model = true;
		}
		catch (err) {
			fail('model', err);
		}
	}

	const status = summarize(requested, outcome);
	logger.info(`${component.info.name}: conversion ${status}`);
	return {
		symbolOk: outcome.symbol,
		footprintOk: outcome.footprint,
		modelOk: outcome.model,
		ok: status === 'success',
		status,
		failures,
	};
}

/** Fetches a part by LCSC id and converts it; an unavailable part throws a `FetchError`. */
export async function convertPart(partId: string, outputBasePath: string, options: ConvertOptions = {}): Promise<ConversionResult> {
	const client = options.client ?? new LcscClient({ logger: options.logger });
	const id = normalizeLcscId(partId);
	const cadData = await client.fetchComponentCadData(id);
	if (cadData === undefined)
		throw new FetchError(`No CAD data available for ${id}`);
	return await convert(cadData, outputBasePath, { ...options, client });
}
