export function safeParseFloat(value: string | undefined, fallback = 0): number {
	if (value === undefined)
		return fallback;
	const n = Number.parseFloat(value.trim());
	return Number.isFinite(n) ? n : fallback;
}

export function safeParseInt(value: string | undefined, fallback = 0): number {
	return Math.trunc(safeParseFloat(value, fallback));
}

/** Source visibility flags are the literal token `show`; anything else is hidden. */
export function parseShow(value: string | undefined): boolean {
	return value === 'show';
}

export function parseBool(value: string | undefined): boolean {
	if (value === undefined)
		return false;
	const s = value.trim().toLowerCase();
	return s === '1' || s === 'true' || s === 'yes';
}

export function fieldAt(fields: readonly string[], index: number): string {
	return fields[index] ?? '';
}

/** Splits a whitespace or comma separated coordinate list into numbers. */
export function parseNumberList(value: string): number[] {
	const out: number[] = [];
	for (const token of value.trim().split(/[\s,]+/u)) {
		if (!token)
			continue;
		const n = Number.parseFloat(token);
		if (Number.isFinite(n))
			out.push(n);
	}
	return out;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === 'object' && !Array.isArray(value);
}
