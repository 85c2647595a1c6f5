import JSZip from 'jszip';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { wrapKiCadSymbolLibrary } from '../../../src/exporter/symbolLibrary';
import { buildReadme, buildZip, bundleLibrary } from '../../../src/exporter/zip';

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), 'zip-'));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

describe('buildReadme', () => {
	it('names the library nickname and the model path', () => {
		const lines = buildReadme('parts').split('\n');
		expect(lines[0]).toBe('KiCad Import Instructions');
		expect(lines).toContain('   Set the library nickname to: parts');
		expect(lines).toContain('   ${KIPRJMOD}/parts.3dshapes/*.step');
	});

	it('takes a custom path variable', () => {
		expect(buildReadme('parts', '${KICAD_USER_3DMODEL_DIR}').split('\n')).toContain('   ${KICAD_USER_3DMODEL_DIR}/parts.3dshapes/*.step');
	});
});

describe('buildZip', () => {
	it('stores the given entries', async () => {
		const buffer = await buildZip([
			{ path: 'a.txt', data: 'alpha' },
			{ path: 'dir/b.bin', data: new Uint8Array([1, 2]) },
		]);
		const zip = await JSZip.loadAsync(buffer);
		expect(await zip.file('a.txt')?.async('string')).toBe('alpha');
		expect([...await zip.file('dir/b.bin')?.async('uint8array') ?? []]).toEqual([1, 2]);
	});
});

describe('bundleLibrary', () => {
	it('packs the library directories and a README', async () => {
		await writeFile(join(dir, 'parts.kicad_sym'), wrapKiCadSymbolLibrary(), 'utf8');
		await mkdir(join(dir, 'parts.pretty'));
		await writeFile(join(dir, 'parts.pretty', 'B.kicad_mod'), '(footprint "B")\n', 'utf8');
		await writeFile(join(dir, 'parts.pretty', 'A.kicad_mod'), '(footprint "A")\n', 'utf8');
		await mkdir(join(dir, 'parts.3dshapes'));
		await writeFile(join(dir, 'parts.3dshapes', 'A.step'), 'ISO', 'utf8');

		const zip = await JSZip.loadAsync(await bundleLibrary(dir, 'parts'));
		const files = Object.keys(zip.files).filter(name => !zip.files[name]?.dir);
		expect(files.sort()).toEqual([
			'README.txt',
			'parts.3dshapes/A.step',
			'parts.kicad_sym',
			'parts.pretty/A.kicad_mod',
			'parts.pretty/B.kicad_mod',
		]);
		expect(await zip.file('parts.pretty/A.kicad_mod')?.async('string')).toBe('(footprint "A")\n');
		expect(await zip.file('README.txt')?.async('string')).toBe(buildReadme('parts'));
	});

	it('refuses an empty library', async () => {
		await expect(bundleLibrary(dir, 'parts')).rejects.toThrow(`Nothing to bundle for parts in ${dir}`);
	});
});
