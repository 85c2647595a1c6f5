import { isRecord } from '../core/parsers/utils';

export interface ExtractedHeadAndShape {
	head: Record<string, unknown>;
	shape: string[];
}

export function tryParseJsonString(value: string): unknown | undefined {
	const trimmed = value.trim();
	if (!trimmed) {
		return undefined;
	}
	const first = trimmed[0];
	if (first !== '{' && first !== '[' && first !== '"') {
		return undefined;
	}
	try {
		return JSON.parse(trimmed);
	}
	catch {
		return undefined;
	}
}

function normalizeShape(value: unknown): string[] | undefined {
	if (Array.isArray(value)) {
		return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
	}
	if (typeof value === 'string') {
		const asJson = tryParseJsonString(value);
		if (Array.isArray(asJson)) {
			return asJson.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
		}
		return value
			.split(/\r?\n/u)
			.map(line => line.trim())
			.filter(Boolean);
	}
	return undefined;
}

function normalizeHead(value: unknown): Record<string, unknown> | undefined {
	if (isRecord(value)) {
		return value;
	}
	if (typeof value === 'string') {
		const parsed = tryParseJsonString(value);
		if (isRecord(parsed)) {
			return parsed;
		}
	}
	return undefined;
}

function toHeadAndShape(value: unknown): ExtractedHeadAndShape | undefined {
	if (!isRecord(value)) {
		return undefined;
	}
	const head = normalizeHead(value.head);
	if (!head) {
		return undefined;
	}
	const shape = normalizeShape(value.shape ?? []);
	if (!shape) {
		return undefined;
	}
	return { head, shape };
}

function findHeadAndShape(value: unknown, depth: number): ExtractedHeadAndShape | undefined {
	if (depth <= 0) {
		return undefined;
	}
	const direct = toHeadAndShape(value);
	if (direct) {
		return direct;
	}

	if (typeof value === 'string') {
		const parsed = tryParseJsonString(value);
		if (parsed === undefined) {
			return undefined;
		}
		return findHeadAndShape(parsed, depth - 1);
	}

	if (Array.isArray(value)) {
		for (const item of value) {
			const found = findHeadAndShape(item, depth - 1);
			if (found)
				return found;
		}
		return undefined;
	}

	if (!isRecord(value)) {
		return undefined;
	}
	for (const child of Object.values(value)) {
		const found = findHeadAndShape(child, depth - 1);
		if (found)
			return found;
	}
	return undefined;
}

function sourcePreview(source: unknown): string {
	if (typeof source === 'string') {
		return source
			.slice(0, 160)
			.replaceAll(/\s+/gu, ' ')
			.trim();
	}
	try {
		return (JSON.stringify(source) ?? String(source)).slice(0, 160);
	}
	catch {
		return String(source).slice(0, 160);
	}
}

/**
 * Locates the `{ head, shape[] }` document inside a `dataStr` value, which
 * may arrive as a JSON string or already parsed.
 */
export function extractHeadAndShape(documentSource: unknown): ExtractedHeadAndShape {
	let parsed: unknown = documentSource;
	if (typeof documentSource === 'string') {
		try {
			parsed = JSON.parse(documentSource);
		}
		catch {
			throw new Error(`Document source is not valid JSON; preview="${sourcePreview(documentSource)}"`);
		}
	}

	const found = findHeadAndShape(parsed, 4);
	if (!found) {
		const keys = isRecord(parsed) ? Object.keys(parsed).slice(0, 16).join(',') : '';
		throw new Error(`Unable to find { head, shape[] } in document source; keys=[${keys}] preview="${sourcePreview(documentSource)}"`);
	}
	return found;
}
