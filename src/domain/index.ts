export * from './types';
export * from './id';
export * from './errors';
export * from './factories';
export * from './naming';

export * from './selectors/folders';

export * from './display/projectDisplayList';
export * from './display/indexMapper';

export * from './moves/resolveMove';

export * from './invariants/checkStructure';

export * from './config/sampleCatalog';
export * from './config/rowPalette';
