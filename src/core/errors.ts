export type ConversionStep = 'fetch' | 'symbol' | 'footprint' | 'model';

export class ConversionError extends Error {
	readonly step: ConversionStep;

	constructor(step: ConversionStep, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ConversionError';
		this.step = step;
	}
}

/** Network failure, timeout, non-success status or an unusable CAD envelope. */
export class FetchError extends ConversionError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('fetch', message, options);
		this.name = 'FetchError';
	}
}

/** A required payload section (`dataStr`, `packageDetail`) is absent. */
export class MissingSectionError extends ConversionError {
	readonly section: string;

	constructor(step: ConversionStep, section: string) {
		super(step, `CAD data has no ${section} section`);
		this.name = 'MissingSectionError';
		this.section = section;
	}
}

/** An existing library file does not look like the envelope it should be. */
export class LibraryFormatError extends ConversionError {
	readonly path: string;

	constructor(step: ConversionStep, path: string, message: string) {
		super(step, `${path}: ${message}`);
		this.name = 'LibraryFormatError';
		this.path = path;
	}
}
