export * from './fallback';
export * from './footprint';
export * from './svg-arc';
export * from './symbol';
export * from './units';
