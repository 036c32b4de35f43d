import type { FolderSeed, ItemSeed } from '../types';

/**
 * Sample rows and folders used by `RowsStore.loadSample()`.
 *
 * Root order: Row 1, Row 2, Folder A, Row 3, Row 4, Folder B, Row 5.
 */

export const SAMPLE_ITEMS: readonly ItemSeed[] = [
  { name: 'Row 1' },
  { name: 'Row 2' },
  { name: 'Row 3' },
  { name: 'Row 4' },
  { name: 'Row 5' }
];

export const SAMPLE_FOLDERS: readonly FolderSeed[] = [
  { name: 'Folder A', contents: [{ name: 'A.1' }, { name: 'A.2' }, { name: 'A.3' }], position: 2 },
  { name: 'Folder B', contents: [{ name: 'B.1' }], position: 5 }
];
