export * from './easyeda';
export * from './kicad';
