export * from './types/config.js';
export * from './types/enums.js';
export * from './types/structs.js';

export * from './math/checked.js';
export * from './math/curve.js';
export * from './math/week.js';
