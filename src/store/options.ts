import type { MutationOptions } from './mutations';

export type RowsStoreOptions = MutationOptions & {
  /** Whether display lists (and drag indices) include drop-zone sentinels after each folder. */
  includeDropZones: boolean;
  /** Assert the root/folder-table invariants after every change and throw on a violation. */
  strictInvariants: boolean;
  /** Trace resolved moves and ignored operations to the console. */
  debug: boolean;
};

function isProductionBuild(): boolean {
  return typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';
}

export function defaultRowsStoreOptions(): RowsStoreOptions {
  return {
    includeDropZones: false,
    expandOnTransfer: true,
    autoDeleteEmptyFolders: false,
    strictInvariants: !isProductionBuild(),
    debug: false
  };
}

export function resolveRowsStoreOptions(partial: Partial<RowsStoreOptions> = {}): RowsStoreOptions {
  const defaults = defaultRowsStoreOptions();
  return {
    includeDropZones: partial.includeDropZones ?? defaults.includeDropZones,
    expandOnTransfer: partial.expandOnTransfer ?? defaults.expandOnTransfer,
    autoDeleteEmptyFolders: partial.autoDeleteEmptyFolders ?? defaults.autoDeleteEmptyFolders,
    strictInvariants: partial.strictInvariants ?? defaults.strictInvariants,
    debug: partial.debug ?? defaults.debug
  };
}
