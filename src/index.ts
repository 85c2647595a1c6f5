export * from './config';
export * from './core';
export { buildComponentData, cadDataSchema, parseCadData } from './exporter/convert';
export type { CadData, ComponentDataOptions } from './exporter/convert';
export { convert, convertPart } from './exporter/exportToKicad';
export { exportFootprintToLibrary } from './exporter/footprintLibrary';
export { LcscClient } from './exporter/lcsc';
export type { LcscClientOptions } from './exporter/lcsc';
export { createLibraryStructure, libraryPaths } from './exporter/libraryLayout';
export type { LibraryPaths } from './exporter/libraryLayout';
export { extractHeadAndShape } from './exporter/librarySource';
export { exportModelFiles } from './exporter/modelLibrary';
export type { ModelFiles, ModelWriteResult } from './exporter/modelLibrary';
export { exportSymbolToLibrary, findSymbolRecord, wrapKiCadSymbolLibrary } from './exporter/symbolLibrary';
export * from './exporter/types';
export { extractLcscIds, isLcscId, normalizeLcscId, sanitizeFileName, sanitizeName } from './exporter/utils';
export { bundleLibrary, buildReadme } from './exporter/zip';
export { configureLogging, getLogger } from './logger';
export type { Logger, LoggingOptions } from './logger';
