export * as folderMutations from './folders';
export * as itemMutations from './items';
export * as moveMutations from './moves';

export type { MutationOptions } from './helpers';
