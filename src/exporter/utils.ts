export function sanitizeName(name: string): string {
	return name.replace(/[^\w.-]/g, '_');
}

export function sanitizeFileName(name: string): string {
	return sanitizeName(name).replace(/^_+/, '').slice(0, 180) || 'export';
}

export function isLcscId(value?: string): value is string {
	if (!value)
		return false;
	return /^C\d+$/i.test(value.trim());
}

export function normalizeLcscId(value: string): string {
	return value.trim().toUpperCase();
}

export function extractLcscIds(text: string): string[] {
	const matches = text.toUpperCase().match(/\bC\d+\b/g) ?? [];
	return [...new Set(matches)];
}

export function errorToMessage(err: unknown): string {
	if (err instanceof Error) {
		if (err.stack) {
			return err.stack;
		}
		return err.message;
	}
	return String(err);
}

export function compactError(err: unknown): string {
	if (err instanceof Error && err.message.trim()) {
		return err.message.split('\n')[0]?.trim() ?? err.message;
	}
	const firstLine = errorToMessage(err).split('\n')[0]?.trim();
	return firstLine || 'Unknown error';
}

export function formatFailureDetails(failures: string[]): string {
	if (failures.length === 0) {
		return '';
	}
	const shown = failures.slice(0, 5);
	const lines = shown.map((item, index) => `${index + 1}. ${item}`);
	if (failures.length > shown.length) {
		lines.push(`...and ${failures.length - shown.length} more`);
	}
	return lines.join('\n');
}
