import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { wrapKiCadSymbolLibrary } from './symbolLibrary';

export interface LibraryPaths {
	symbolLibrary: string;
	footprintDir: string;
	modelDir: string;
}

export function libraryPaths(baseDir: string, libName: string): LibraryPaths {
	return {
		symbolLibrary: join(baseDir, `${libName}.kicad_sym`),
		footprintDir: join(baseDir, `${libName}.pretty`),
		modelDir: join(baseDir, `${libName}.3dshapes`),
	};
}

export async function pathExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	}
	catch {
		return false;
	}
}

/**
 * Creates `<lib>.pretty`, `<lib>.3dshapes` and an empty `<lib>.kicad_sym`.
 * Existing files are left alone.
 */
export async function createLibraryStructure(baseDir: string, libName: string): Promise<LibraryPaths> {
	const paths = libraryPaths(baseDir, libName);
	await mkdir(paths.footprintDir, { recursive: true });
	await mkdir(paths.modelDir, { recursive: true });
	if (!await pathExists(paths.symbolLibrary)) {
		await writeFile(paths.symbolLibrary, wrapKiCadSymbolLibrary(), 'utf8');
	}
	return paths;
}
