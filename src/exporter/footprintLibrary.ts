import type { WriteOptions, WriteOutcome } from './types';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getLogger } from '../logger';
import { pathExists } from './libraryLayout';

/** Writes `<dir>/<name>.kicad_mod`. */
export async function exportFootprintToLibrary(
	footprintDir: string,
	name: string,
	content: string,
	options: WriteOptions,
): Promise<WriteOutcome> {
	const logger = options.logger ?? getLogger('footprint-library');
	const target = join(footprintDir, `${name}.kicad_mod`);
	if (!options.overwrite && await pathExists(target)) {
		logger.warn(`Footprint ${name} already exists in ${footprintDir}, skipping`);
		return 'skipped';
	}
	await mkdir(footprintDir, { recursive: true });
	await writeFile(target, content, 'utf8');
	logger.info(`Footprint ${name} written to ${target}`);
	return 'written';
}
