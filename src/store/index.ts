export { RowsStore, createRowsStore, rowsStore } from './rowsStore';
export type { DragOptions, RowsStoreState } from './rowsStore';
export { defaultRowsStoreOptions, resolveRowsStoreOptions } from './options';
export type { RowsStoreOptions } from './options';
export { createDebugLog, isDebugFlagSet } from './debugLog';
export type { DebugLog } from './debugLog';
export { useDisplayList, useRowsStore } from './hooks';
export * from './mutations';
