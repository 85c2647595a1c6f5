import JSZip from 'jszip';
import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { libraryPaths, pathExists } from './libraryLayout';

export interface ZipFileEntry {
	path: string;
	data: string | Uint8Array;
}

export function buildReadme(baseName: string, modelPathVar = '${KIPRJMOD}'): string {
	return [
		'KiCad Import Instructions',
		`1) Unzip into your KiCad project folder (recommended).`,
		`2) Symbol library: Preferences -> Manage Symbol Libraries -> Add Existing Library -> choose "${baseName}.kicad_sym"`,
		`   Set the library nickname to: ${baseName}`,
		`3) Footprint library: Preferences -> Manage Footprint Libraries -> Add Existing Library -> choose "${baseName}.pretty"`,
		`   Set the library nickname to: ${baseName}`,
		'4) 3D models (if present) are referenced as:',
		`   ${modelPathVar}/${baseName}.3dshapes/*.step`,
		'',
		'Notes',
		`- The Footprint field of each symbol is written as "${baseName}:<footprint>", so the footprint library nickname must be "${baseName}".`,
		'- Parts without a 3D model still get their symbol and footprint.',
	].join('\n');
}

export async function buildZip(entries: ZipFileEntry[]): Promise<Buffer> {
	const zip = new JSZip();
	for (const entry of entries) {
		zip.file(entry.path, entry.data);
	}
	return await zip.generateAsync({
		type: 'nodebuffer',
		compression: 'DEFLATE',
		compressionOptions: { level: 9 },
	});
}

async function directoryEntries(dir: string, prefix: string): Promise<ZipFileEntry[]> {
	if (!await pathExists(dir)) {
		return [];
	}
	const names = (await readdir(dir, { withFileTypes: true }))
		.filter(entry => entry.isFile())
		.map(entry => entry.name)
		.sort();
	const out: ZipFileEntry[] = [];
	for (const name of names) {
		out.push({ path: `${prefix}/${name}`, data: await readFile(join(dir, name)) });
	}
	return out;
}

/** Zips the symbol library, footprint and model directories of `libName` plus a README. */
export async function bundleLibrary(baseDir: string, libName: string, modelPathVar?: string): Promise<Buffer> {
	const paths = libraryPaths(baseDir, libName);
	const entries: ZipFileEntry[] = [];
	if (await pathExists(paths.symbolLibrary)) {
		entries.push({ path: basename(paths.symbolLibrary), data: await readFile(paths.symbolLibrary, 'utf8') });
	}
	entries.push(...await directoryEntries(paths.footprintDir, basename(paths.footprintDir)));
	entries.push(...await directoryEntries(paths.modelDir, basename(paths.modelDir)));
	if (entries.length === 0) {
		throw new Error(`Nothing to bundle for ${libName} in ${baseDir}`);
	}
	entries.push({ path: 'README.txt', data: buildReadme(libName, modelPathVar) });
	return await buildZip(entries);
}
