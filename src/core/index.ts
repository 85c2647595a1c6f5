export * from './constants/kicad';
export * from './converter';
export * from './errors';
export * from './parsers';
export * from './types';
