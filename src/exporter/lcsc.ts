import type { AxiosInstance } from 'axios';
import type { Logger } from '../logger';
import type { AssetClient } from './types';
import axios from 'axios';
import { DEFAULT_API_BASE, DEFAULT_MODEL_BASE, DEFAULT_STEP_BASE } from '../config';
import { isRecord } from '../core/parsers/utils';
import { getLogger } from '../logger';
import { compactError, normalizeLcscId } from './utils';

/** Editor release the component endpoint expects. */
export const COMPONENT_API_VERSION = '6.4.19.5';

const USER_AGENT = 'kicad-part-import/0.3.0';

export interface LcscClientOptions {
	apiBase?: string;
	modelBase?: string;
	stepBase?: string;
	timeoutMs?: number;
	/** Pre-built instance; tests hand in one with a custom adapter. */
	http?: AxiosInstance;
	logger?: Logger;
}

function describeRequestError(err: unknown): string {
	if (axios.isAxiosError(err)) {
		if (err.response) {
			return `HTTP ${err.response.status}`;
		}
		if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
			return 'timed out';
		}
	}
	return compactError(err);
}

function toBytes(data: unknown): Uint8Array | undefined {
	if (data instanceof ArrayBuffer) {
		return new Uint8Array(data);
	}
	if (ArrayBuffer.isView(data)) {
		return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
	}
	return undefined;
}

/** EasyEDA/LCSC asset endpoints over axios. Failures are logged and resolve to undefined. */
export class LcscClient implements AssetClient {
	private readonly http: AxiosInstance;
	private readonly apiBase: string;
	private readonly modelBase: string;
	private readonly stepBase: string;
	private readonly logger: Logger;

	constructor(options: LcscClientOptions = {}) {
		this.apiBase = options.apiBase ?? DEFAULT_API_BASE;
		this.modelBase = options.modelBase ?? DEFAULT_MODEL_BASE;
		this.stepBase = options.stepBase ?? DEFAULT_STEP_BASE;
		this.logger = options.logger ?? getLogger('lcsc');
		this.http = options.http ?? axios.create({
			timeout: options.timeoutMs ?? 30_000,
			headers: { 'User-Agent': USER_AGENT },
		});
	}

	async fetchComponentCadData(partId: string): Promise<unknown | undefined> {
		const id = normalizeLcscId(partId);
		const url = `${this.apiBase}/${encodeURIComponent(id)}/components`;
		try {
			const response = await this.http.get<unknown>(url, {
				params: { version: COMPONENT_API_VERSION },
				responseType: 'json',
			});
			const body = response.data;
			if (!isRecord(body)) {
				this.logger.warn(`Component ${id}: response is not a JSON object`);
				return undefined;
			}
			if (body.success === false) {
				this.logger.warn(`Component ${id}: API reported failure${typeof body.message === 'string' ? ` (${body.message})` : ''}`);
				return undefined;
			}
			if (body.result === undefined || body.result === null) {
				this.logger.warn(`Component ${id}: response has no result`);
				return undefined;
			}
			this.logger.debug(`Component ${id}: CAD data received`);
			return body.result;
		}
		catch (err) {
			this.logger.error(`Component ${id}: request failed, ${describeRequestError(err)}`);
			return undefined;
		}
	}

	async fetchModelMesh(uuid: string): Promise<string | undefined> {
		try {
			const response = await this.http.get<unknown>(`${this.modelBase}/${encodeURIComponent(uuid)}`, {
				responseType: 'text',
			});
			if (typeof response.data !== 'string' || !response.data.trim()) {
				this.logger.warn(`3D mesh ${uuid}: empty response`);
				return undefined;
			}
			return response.data;
		}
		catch (err) {
			this.logger.warn(`3D mesh ${uuid}: download failed, ${describeRequestError(err)}`);
			return undefined;
		}
	}

	async fetchModelSolid(uuid: string): Promise<Uint8Array | undefined> {
		try {
			const response = await this.http.get<unknown>(`${this.stepBase}/${encodeURIComponent(uuid)}`, {
				responseType: 'arraybuffer',
			});
			const bytes = toBytes(response.data);
			if (!bytes || bytes.byteLength === 0) {
				this.logger.warn(`3D STEP ${uuid}: empty response`);
				return undefined;
			}
			return bytes;
		}
		catch (err) {
			this.logger.warn(`3D STEP ${uuid}: download failed, ${describeRequestError(err)}`);
			return undefined;
		}
	}
}
