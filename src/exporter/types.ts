import type { ConversionStep } from '../core/errors';
import type { Logger } from '../logger';

export type ArtifactStep = Exclude<ConversionStep, 'fetch'>;

export const ALL_STEPS: readonly ArtifactStep[] = ['symbol', 'footprint', 'model'];

/** Asset fetch collaborator; every method resolves to undefined on failure. */
export interface AssetClient {
	fetchComponentCadData: (partId: string) => Promise<unknown | undefined>;
	fetchModelMesh: (uuid: string) => Promise<string | undefined>;
	fetchModelSolid: (uuid: string) => Promise<Uint8Array | undefined>;
}

export interface WriteOptions {
	overwrite: boolean;
	logger?: Logger;
}

export type WriteOutcome = 'written' | 'skipped';

export interface StepFailure {
	step: ArtifactStep;
	message: string;
}

export type ConversionStatus = 'success' | 'partial' | 'failed';

export interface ConversionResult {
	symbolOk: boolean;
	footprintOk: boolean;
	modelOk: boolean;
	ok: boolean;
	status: ConversionStatus;
	failures: StepFailure[];
}

export interface ConvertOptions {
	overwrite?: boolean;
	steps?: readonly ArtifactStep[];
	client?: AssetClient;
	/** Footprint library nickname; defaults to the base name of the output path. */
	footprintLibName?: string;
	/** Path variable the footprint uses to reach the model directory. */
	modelPathVar?: string;
	logger?: Logger;
}
