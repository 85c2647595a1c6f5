#!/usr/bin/env node
import type { AppConfig } from './config';
import type { ArtifactStep, ConversionResult } from './exporter/types';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig } from './config';
import { convertPart } from './exporter/exportToKicad';
import { LcscClient } from './exporter/lcsc';
import { createLibraryStructure } from './exporter/libraryLayout';
import { ALL_STEPS } from './exporter/types';
import { compactError, errorToMessage, extractLcscIds, formatFailureDetails } from './exporter/utils';
import { bundleLibrary } from './exporter/zip';
import { configureLogging, getLogger } from './logger';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
	'Usage: kicad-part-import <LCSC-ID...> [options]',
	'',
	'Options:',
	'  -o, --output <dir>   Output directory (default: $KICAD_PART_OUTPUT or cwd)',
	'  -l, --lib <name>     Library name (default: $KICAD_PART_LIB or lcsc_parts)',
	'      --symbol         Export the symbol',
	'      --footprint      Export the footprint',
	'      --3d             Export the 3D model',
	'      --no-overwrite   Keep parts that already exist in the library',
	'      --zip            Also write <lib>.zip with the library and import notes',
	'      --log-file <f>   Also log to a file',
	'  -d, --debug          Verbose logging',
	'  -h, --help           Show this help',
	'',
	'Without --symbol, --footprint or --3d all three are exported.',
].join('\n');

export interface CliOptions {
	ids: string[];
	outputDir: string;
	libName: string;
	steps: ArtifactStep[];
	overwrite: boolean;
	zip: boolean;
	debug: boolean;
	logFile?: string;
	help: boolean;
}

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

function readArgs(argv: string[]) {
	try {
		return parseArgs({
			args: argv,
			allowPositionals: true,
			strict: true,
			options: {
				'output': { type: 'string', short: 'o' },
				'lib': { type: 'string', short: 'l' },
				'symbol': { type: 'boolean' },
				'footprint': { type: 'boolean' },
				'3d': { type: 'boolean' },
				'no-overwrite': { type: 'boolean' },
				'zip': { type: 'boolean' },
				'log-file': { type: 'string' },
				'debug': { type: 'boolean', short: 'd' },
				'help': { type: 'boolean', short: 'h' },
			},
		});
	}
	catch (err) {
		throw new UsageError(compactError(err));
	}
}

export function parseCliArgs(argv: string[], config: AppConfig): CliOptions {
	const { values, positionals } = readArgs(argv);
	const help = values.help ?? false;

	const ids = extractLcscIds(positionals.join(' '));
	const unknown = positionals.filter(arg => extractLcscIds(arg).length === 0);
	if (!help && unknown.length > 0)
		throw new UsageError(`Not an LCSC part id: ${unknown.join(', ')}`);
	if (!help && ids.length === 0)
		throw new UsageError('No LCSC part id given');

	const picked = ALL_STEPS.filter(step => (step === 'model' ? values['3d'] : values[step]) === true);

	return {
		ids,
		outputDir: values.output ?? config.outputDir,
		libName: values.lib ?? config.libName,
		steps: picked.length > 0 ? picked : [...ALL_STEPS],
		overwrite: !(values['no-overwrite'] ?? false),
		zip: values.zip ?? false,
		debug: values.debug ?? false,
		logFile: values['log-file'],
		help,
	};
}

function describeResult(id: string, result: ConversionResult): string {
	const flag = (ok: boolean) => (ok ? 'ok' : 'failed');
	return `${id}: ${result.status} (symbol ${flag(result.symbolOk)}, footprint ${flag(result.footprintOk)}, 3d ${flag(result.modelOk)})`;
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
	let config: AppConfig;
	let options: CliOptions;
	try {
		config = loadConfig(env);
		options = parseCliArgs(argv, config);
	}
	catch (err) {
		process.stderr.write(`${compactError(err)}\n\n${USAGE}\n`);
		return EXIT_USAGE;
	}
	if (options.help) {
		process.stdout.write(`${USAGE}\n`);
		return EXIT_OK;
	}

	configureLogging({ level: options.debug ? 'debug' : config.logLevel, file: options.logFile });
	const logger = getLogger('cli');
	const client = new LcscClient({
		apiBase: config.apiBase,
		modelBase: config.modelBase,
		stepBase: config.stepBase,
		timeoutMs: config.timeoutMs,
	});

	const outputBasePath = join(options.outputDir, options.libName);
	await createLibraryStructure(options.outputDir, options.libName);

	const failures: string[] = [];
	let succeeded = 0;
	for (const id of options.ids) {
		try {
			const result = await convertPart(id, outputBasePath, {
				client,
				overwrite: options.overwrite,
				steps: options.steps,
				modelPathVar: config.modelPathVar,
			});
			logger.info(describeResult(id, result));
			if (result.ok)
				succeeded++;
			failures.push(...result.failures.map(failure => `${id} ${failure.step}: ${failure.message}`));
		}
		catch (err) {
			failures.push(`${id}: ${compactError(err)}`);
			logger.error(`${id}: ${errorToMessage(err)}`);
		}
	}

	if (options.zip) {
		try {
			const zipPath = join(options.outputDir, `${options.libName}.zip`);
			await writeFile(zipPath, await bundleLibrary(options.outputDir, options.libName, config.modelPathVar));
			logger.info(`Library bundled into ${zipPath}`);
		}
		catch (err) {
			failures.push(`zip: ${compactError(err)}`);
			logger.error(`Bundling failed: ${errorToMessage(err)}`);
		}
	}

	logger.info(`Converted ${succeeded}/${options.ids.length} part(s)`);
	if (failures.length > 0) {
		logger.warn(`Failures:\n${formatFailureDetails(failures)}`);
		return EXIT_FAILED;
	}
	return EXIT_OK;
}

if (require.main === module) {
	main(process.argv.slice(2))
		.then((code) => {
			process.exitCode = code;
		})
		.catch((err: unknown) => {
			process.stderr.write(`${errorToMessage(err)}\n`);
			process.exitCode = EXIT_FAILED;
		});
}
