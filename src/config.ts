import { z } from 'zod';

export const DEFAULT_API_BASE = 'https://easyeda.com/api/products';
export const DEFAULT_MODEL_BASE = 'https://modules.easyeda.com/3dmodel';
export const DEFAULT_STEP_BASE = 'https://modules.easyeda.com/qAxj6KHrDKw4blvCG8QJPs7Y';
export const DEFAULT_LIB_NAME = 'lcsc_parts';
export const DEFAULT_MODEL_PATH_VAR = '${KIPRJMOD}';

const envSchema = z.object({
	LCSC_API_BASE: z.string().url().default(DEFAULT_API_BASE),
	LCSC_MODEL_BASE: z.string().url().default(DEFAULT_MODEL_BASE),
	LCSC_STEP_BASE: z.string().url().default(DEFAULT_STEP_BASE),
	LCSC_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
	KICAD_PART_LIB: z.string().min(1).default(DEFAULT_LIB_NAME),
	KICAD_PART_OUTPUT: z.string().min(1).optional(),
	KICAD_MODEL_PATH_VAR: z.string().min(1).default(DEFAULT_MODEL_PATH_VAR),
	LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export interface AppConfig {
	apiBase: string;
	modelBase: string;
	stepBase: string;
	timeoutMs: number;
	libName: string;
	/** Output directory; defaults to the working directory. */
	outputDir: string;
	modelPathVar: string;
	logLevel: 'error' | 'warn' | 'info' | 'debug';
}

function stripTrailingSlash(url: string): string {
	return url.replace(/\/+$/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
	// empty variables count as unset
	const present = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
	);
	const result = envSchema.safeParse(present);
	if (!result.success) {
		const detail = result.error.issues
			.map(issue => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		throw new Error(`Invalid configuration: ${detail}`);
	}
	const parsed = result.data;
	return {
		apiBase: stripTrailingSlash(parsed.LCSC_API_BASE),
		modelBase: stripTrailingSlash(parsed.LCSC_MODEL_BASE),
		stepBase: stripTrailingSlash(parsed.LCSC_STEP_BASE),
		timeoutMs: parsed.LCSC_TIMEOUT_MS,
		libName: parsed.KICAD_PART_LIB,
		outputDir: parsed.KICAD_PART_OUTPUT ?? cwd,
		modelPathVar: parsed.KICAD_MODEL_PATH_VAR,
		logLevel: parsed.LOG_LEVEL,
	};
}
