import { lookupFolder } from '../selectors/folders';
import type { DisplayNode, ItemContext, RootEntry, RowsModel } from '../types';
import { projectDisplayList } from './projectDisplayList';

/** Display rows taken by one root entry, including expanded contents and its drop zone. */
function blockLength(model: RowsModel, entry: RootEntry, includeDropZones: boolean): number {
  if (entry.kind === 'item') return 1;
  const folder = lookupFolder(model, entry.folderId);
  return 1 + (folder.isExpanded ? folder.contents.length : 0) + (includeDropZones ? 1 : 0);
}

/**
 * Maps a display index (or insertion offset) to a root sequence index.
 *
 * Returns the number of root entries whose block starts before `displayIndex`.
 * An offset that falls inside an expanded folder maps to the slot after that
 * folder; offsets past the end map to `root.length`.
 */
export function displayIndexToRootIndex(model: RowsModel, displayIndex: number, includeDropZones: boolean): number {
  let rootCount = 0;
  let position = 0;

  for (const entry of model.root) {
    if (position >= displayIndex) return rootCount;
    position += blockLength(model, entry, includeDropZones);
    rootCount++;
  }

  return rootCount;
}

/** Inverse direction: the display row of a root entry, or -1 when out of range. */
export function rootIndexToDisplayIndex(model: RowsModel, rootIndex: number, includeDropZones: boolean): number {
  if (rootIndex < 0 || rootIndex > model.root.length) return -1;
  let position = 0;
  for (let i = 0; i < rootIndex; i++) {
    position += blockLength(model, model.root[i], includeDropZones);
  }
  return position;
}

export function locateContextIn(display: readonly DisplayNode[], displayIndex: number): ItemContext {
  if (displayIndex < 0 || displayIndex >= display.length) return { kind: 'root' };

  for (let i = displayIndex; i >= 0; i--) {
    const node = display[i];
    if (node.kind !== 'folder') continue;
    if (i === displayIndex) return { kind: 'root' };

    const { folder } = node;
    if (folder.isExpanded && displayIndex <= i + folder.contents.length) {
      return { kind: 'folder', folderId: folder.id };
    }
    // Contents are contiguous, so an earlier folder cannot contain the index either.
    return { kind: 'root' };
  }

  return { kind: 'root' };
}

/** Which container the row (or insertion offset) at `displayIndex` belongs to. */
export function locateContext(model: RowsModel, displayIndex: number, includeDropZones: boolean): ItemContext {
  return locateContextIn(projectDisplayList(model, includeDropZones), displayIndex);
}

export type FolderSpan = {
  /** Display index of the folder row. */
  row: number;
  /** Display index of the first content item (= insertion offset for position 0). */
  start: number;
  /**
   * Last insertion offset that still belongs to the folder: `start + contents.length`.
   * Inserting here appends after the last item.
   */
  end: number;
};

/** Insertable range of an expanded folder. Collapsed and unknown folders have none. */
export function folderSpan(model: RowsModel, folderId: string, includeDropZones: boolean): FolderSpan | undefined {
  let position = 0;

  for (const entry of model.root) {
    if (entry.kind === 'folder' && entry.folderId === folderId) {
      const folder = lookupFolder(model, folderId);
      if (!folder.isExpanded) return undefined;
      const start = position + 1;
      return { row: position, start, end: start + folder.contents.length };
    }
    position += blockLength(model, entry, includeDropZones);
  }

  return undefined;
}

/** Display row of a folder, or -1 when it is not in the root sequence. */
export function displayIndexOfFolder(model: RowsModel, folderId: string, includeDropZones: boolean): number {
  let position = 0;
  for (const entry of model.root) {
    if (entry.kind === 'folder' && entry.folderId === folderId) return position;
    position += blockLength(model, entry, includeDropZones);
  }
  return -1;
}
