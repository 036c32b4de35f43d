/**
 * Core domain types for the rows-and-folders model.
 *
 * The model is two levels deep: an ordered root sequence holding items and
 * folder references, plus a folder table that owns each folder's contents and
 * expanded state. Folders never nest.
 */

export type Item = {
  id: string;
  name: string;
};

export type Folder = {
  id: string;
  name: string;
  /** Ordered contents. An item lives in exactly one folder or at the root. */
  contents: Item[];
  isExpanded: boolean;
};

/**
 * Root sequence entry. Folders are referenced by id only; their contents and
 * expanded state are always read from `RowsModel.folders`.
 */
export type RootEntry =
  | { kind: 'item'; item: Item }
  | { kind: 'folder'; folderId: string };

export type RowsModel = {
  root: RootEntry[];
  folders: Record<string, Folder>;
};

/** Derived, never stored. Rebuilt from the model after every change. */
export type DisplayNode =
  | { kind: 'item'; item: Item; isNested: boolean; folderId?: string }
  | { kind: 'folder'; folder: Folder }
  | { kind: 'dropZone'; folderId: string };

export type ItemContext = { kind: 'root' } | { kind: 'folder'; folderId: string };

/**
 * How a drop relates to the row under the pointer.
 * - `between`: insert before the node at the target index.
 * - `on`: dropped onto the row itself (a folder row accepts the item).
 */
export type DropPosition = 'between' | 'on';

export type MoveOp =
  | { kind: 'reorder'; context: ItemContext; from: number; to: number }
  | { kind: 'transfer'; itemId: string; from: ItemContext; to: ItemContext; insertAt?: number }
  | { kind: 'folderReorder'; from: number; to: number }
  | { kind: 'invalid'; reason: string };

export type ItemSeed = {
  id?: string;
  name: string;
};

export type FolderSeed = {
  id?: string;
  name: string;
  contents?: ItemSeed[];
  isExpanded?: boolean;
  /** Root position to insert the folder at. Folders without one are appended. */
  position?: number;
};
