import type { WriteOptions, WriteOutcome } from './types';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { KICAD_GENERATOR, KICAD_SYMBOL_VERSION } from '../core/constants/kicad';
import { quote } from '../core/converter/symbol';
import { LibraryFormatError } from '../core/errors';
import { getLogger } from '../logger';

const ENVELOPE_OPENING = '(kicad_symbol_lib';

export function wrapKiCadSymbolLibrary(entries: string[] = []): string {
	const header = `${ENVELOPE_OPENING}\n\t(version ${KICAD_SYMBOL_VERSION})\n\t(generator ${KICAD_GENERATOR})\n`;
	return `${header + entries.join('')})\n`;
}

/** Index one past the parenthesis closing the one at `start`; strings are skipped. */
export function findBalancedEnd(content: string, start: number): number | undefined {
	let depth = 0;
	let inString = false;
	let escaped = false;

	for (let i = start; i < content.length; i++) {
		const ch = content[i];

		if (inString) {
			if (escaped) {
				escaped = false;
			}
			else if (ch === '\\') {
				escaped = true;
			}
			else if (ch === '"') {
				inString = false;
			}
			continue;
		}

		if (ch === '"') {
			inString = true;
			continue;
		}
		if (ch === '(') {
			depth++;
			continue;
		}
		if (ch === ')') {
			depth--;
			if (depth === 0) {
				return i + 1;
			}
		}
	}
	return undefined;
}

export interface RecordSpan {
	start: number;
	end: number;
}

/**
 * Span of the `(symbol "<id>"` record, widened to whole lines so the
 * record's indentation and trailing newline go with it.
 */
export function findSymbolRecord(content: string, symbolId: string): RecordSpan | undefined {
	const marker = `(symbol ${quote(symbolId)}`;
	const open = content.indexOf(marker);
	if (open < 0) {
		return undefined;
	}
	const close = findBalancedEnd(content, open);
	if (close === undefined) {
		return undefined;
	}
	const lineStart = content.lastIndexOf('\n', open - 1) + 1;
	const start = content.slice(lineStart, open).trim() ? open : lineStart;
	const end = content[close] === '\n' ? close + 1 : close;
	return { start, end };
}

export interface UpsertResult {
	content: string;
	outcome: WriteOutcome;
}

/** Replaces or appends one record in library text; pure. */
export function upsertSymbolRecord(content: string, entry: string, symbolId: string, overwrite: boolean): UpsertResult {
	const existing = findSymbolRecord(content, symbolId);
	if (existing) {
		if (!overwrite) {
			return { content, outcome: 'skipped' };
		}
		return {
			content: content.slice(0, existing.start) + entry + content.slice(existing.end),
			outcome: 'written',
		};
	}

	const insertAt = content.lastIndexOf(')');
	if (insertAt < 0) {
		throw new Error('library has no closing parenthesis');
	}
	return {
		content: content.slice(0, insertAt) + entry + content.slice(insertAt),
		outcome: 'written',
	};
}

async function readIfExists(path: string): Promise<string | undefined> {
	try {
		return await readFile(path, 'utf8');
	}
	catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
			return undefined;
		}
		throw err;
	}
}

/**
 * Writes one symbol record into a `.kicad_sym` library, creating the
 * library when absent. An existing record is kept when `overwrite` is off.
 */
export async function exportSymbolToLibrary(
	libraryPath: string,
	entry: string,
	symbolId: string,
	options: WriteOptions,
): Promise<WriteOutcome> {
	const logger = options.logger ?? getLogger('symbol-library');
	const current = await readIfExists(libraryPath);
	if (current !== undefined && !current.trimStart().startsWith(ENVELOPE_OPENING)) {
		throw new LibraryFormatError('symbol', libraryPath, 'not a KiCad symbol library');
	}

	let result: UpsertResult;
	try {
		result = upsertSymbolRecord(current ?? wrapKiCadSymbolLibrary(), entry, symbolId, options.overwrite);
	}
	catch (err) {
		throw new LibraryFormatError('symbol', libraryPath, err instanceof Error ? err.message : String(err));
	}

	if (result.outcome === 'skipped') {
		logger.warn(`Symbol ${symbolId} already exists in ${libraryPath}, skipping`);
		return 'skipped';
	}
	await mkdir(dirname(libraryPath), { recursive: true });
	await writeFile(libraryPath, result.content, 'utf8');
	logger.info(`Symbol ${symbolId} written to ${libraryPath}`);
	return 'written';
}
