export * from './easyeda-shapes';
export * from './fields';
export * from './svgnode';
export { fieldAt, isRecord, parseBool, parseNumberList, parseShow, safeParseFloat, safeParseInt } from './utils';
