import { describe, expect, it } from 'vitest';
import {
	DEFAULT_API_BASE,
	DEFAULT_LIB_NAME,
	DEFAULT_MODEL_BASE,
	DEFAULT_MODEL_PATH_VAR,
	DEFAULT_STEP_BASE,
	loadConfig,
} from '../../src/config';

describe('loadConfig', () => {
	it('falls back to defaults', () => {
		expect(loadConfig({}, '/work')).toEqual({
			apiBase: DEFAULT_API_BASE,
			modelBase: DEFAULT_MODEL_BASE,
			stepBase: DEFAULT_STEP_BASE,
			timeoutMs: 30_000,
			libName: DEFAULT_LIB_NAME,
			outputDir: '/work',
			modelPathVar: DEFAULT_MODEL_PATH_VAR,
			logLevel: 'info',
		});
	});

	it('reads the environment', () => {
		const config = loadConfig({
			LCSC_API_BASE: 'http://localhost:9/api//',
			LCSC_TIMEOUT_MS: '5000',
			KICAD_PART_LIB: 'my_parts',
			KICAD_PART_OUTPUT: '/libs',
			KICAD_MODEL_PATH_VAR: '${KICAD_USER_3DMODEL_DIR}',
			LOG_LEVEL: 'debug',
		}, '/work');
		expect(config).toMatchObject({
			apiBase: 'http://localhost:9/api',
			timeoutMs: 5000,
			libName: 'my_parts',
			outputDir: '/libs',
			modelPathVar: '${KICAD_USER_3DMODEL_DIR}',
			logLevel: 'debug',
		});
	});

	it('treats empty variables as unset', () => {
		const config = loadConfig({ LCSC_API_BASE: '', KICAD_PART_OUTPUT: '  ' }, '/work');
		expect(config.apiBase).toBe(DEFAULT_API_BASE);
		expect(config.outputDir).toBe('/work');
	});

	it('rejects invalid values', () => {
		expect(() => loadConfig({ LCSC_TIMEOUT_MS: 'soon' })).toThrow('Invalid configuration: LCSC_TIMEOUT_MS');
		expect(() => loadConfig({ LCSC_TIMEOUT_MS: '-1' })).toThrow('Invalid configuration: LCSC_TIMEOUT_MS');
		expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid configuration: LOG_LEVEL');
		expect(() => loadConfig({ LCSC_MODEL_BASE: 'not a url' })).toThrow('Invalid configuration: LCSC_MODEL_BASE');
	});
});
