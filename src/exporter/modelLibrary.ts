import type { WriteOptions, WriteOutcome } from './types';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getLogger } from '../logger';
import { pathExists } from './libraryLayout';

export interface ModelFiles {
	/** OBJ mesh text. */
	objData?: string;
	/** STEP solid bytes. */
	stepData?: Uint8Array;
}

export interface ModelWriteResult {
	obj?: WriteOutcome;
	step?: WriteOutcome;
}

export function modelWriteSucceeded(result: ModelWriteResult): boolean {
	return result.obj !== undefined || result.step !== undefined;
}

async function writeOne(
	target: string,
	data: string | Uint8Array,
	options: WriteOptions,
): Promise<WriteOutcome> {
	if (!options.overwrite && await pathExists(target)) {
		return 'skipped';
	}
	await writeFile(target, data);
	return 'written';
}

/** Writes `<name>.obj` and `<name>.step` for whichever payloads are present. */
export async function exportModelFiles(
	modelDir: string,
	name: string,
	files: ModelFiles,
	options: WriteOptions,
): Promise<ModelWriteResult> {
	const logger = options.logger ?? getLogger('model-library');
	const result: ModelWriteResult = {};
	if (files.objData === undefined && files.stepData === undefined) {
		logger.warn(`No 3D data for ${name}`);
		return result;
	}

	await mkdir(modelDir, { recursive: true });
	if (files.objData !== undefined) {
		result.obj = await writeOne(join(modelDir, `${name}.obj`), files.objData, options);
	}
	if (files.stepData !== undefined) {
		result.step = await writeOne(join(modelDir, `${name}.step`), files.stepData, options);
	}
	logger.info(`3D model ${name}: obj=${result.obj ?? 'missing'} step=${result.step ?? 'missing'}`);
	return result;
}
