import { afterEach, describe, expect, it, vi } from 'vitest';
import { EXIT_OK, EXIT_USAGE, main, parseCliArgs, USAGE, UsageError } from '../../src/cli';
import { loadConfig } from '../../src/config';

const config = loadConfig({}, '/work');

afterEach(() => {
	vi.restoreAllMocks();
});

describe('parseCliArgs', () => {
	it('defaults to every step', () => {
		expect(parseCliArgs(['C1234', 'c5678', '-o', 'out'], config)).toEqual({
			ids: ['C1234', 'C5678'],
			outputDir: 'out',
			libName: 'lcsc_parts',
			steps: ['symbol', 'footprint', 'model'],
			overwrite: true,
			zip: false,
			debug: false,
			logFile: undefined,
			help: false,
		});
	});

	it('narrows to the selected steps', () => {
		expect(parseCliArgs(['C1', '--symbol', '--3d'], config).steps).toEqual(['symbol', 'model']);
	});

	it('reads the remaining flags', () => {
		const options = parseCliArgs(['C1', '--no-overwrite', '--zip', '-d', '-l', 'mine', '--log-file', 'run.log'], config);
		expect(options).toMatchObject({ overwrite: false, zip: true, debug: true, libName: 'mine', logFile: 'run.log', outputDir: '/work' });
	});

	it('rejects positionals that are not part ids', () => {
		expect(() => parseCliArgs(['C1', 'resistor'], config)).toThrow(new UsageError('Not an LCSC part id: resistor'));
	});

	it('needs at least one part id', () => {
		expect(() => parseCliArgs([], config)).toThrow('No LCSC part id given');
	});

	it('rejects unknown options', () => {
		expect(() => parseCliArgs(['C1', '--bogus'], config)).toThrow(UsageError);
	});

	it('allows help without ids', () => {
		expect(parseCliArgs(['--help'], config)).toMatchObject({ help: true, ids: [] });
	});
});

describe('main', () => {
	it('prints usage on bad arguments', async () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		expect(await main([], {})).toBe(EXIT_USAGE);
		expect(stderr).toHaveBeenCalledWith(`No LCSC part id given\n\n${USAGE}\n`);
	});

	it('prints usage on invalid configuration', async () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		expect(await main(['C1'], { LOG_LEVEL: 'loud' })).toBe(EXIT_USAGE);
		expect(stderr).toHaveBeenCalledTimes(1);
	});

	it('prints help', async () => {
		const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
		expect(await main(['-h'], {})).toBe(EXIT_OK);
		expect(stdout).toHaveBeenCalledWith(`${USAGE}\n`);
	});
});
