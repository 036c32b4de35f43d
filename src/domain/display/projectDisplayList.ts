import { lookupFolder } from '../selectors/folders';
import type { DisplayNode, RowsModel } from '../types';

/**
 * Flattens the model into the list a renderer shows.
 *
 * Folders are always read from the folder table. Expanded folders are followed
 * by their contents; with `includeDropZones` every folder block (expanded or
 * not) is closed by a drop-zone sentinel.
 */
export function projectDisplayList(model: RowsModel, includeDropZones: boolean): DisplayNode[] {
  const out: DisplayNode[] = [];

  for (const entry of model.root) {
    if (entry.kind === 'item') {
      out.push({ kind: 'item', item: entry.item, isNested: false });
      continue;
    }

    const folder = lookupFolder(model, entry.folderId);
    out.push({ kind: 'folder', folder });
    if (folder.isExpanded) {
      for (const item of folder.contents) {
        out.push({ kind: 'item', item, isNested: true, folderId: folder.id });
      }
    }
    if (includeDropZones) {
      out.push({ kind: 'dropZone', folderId: folder.id });
    }
  }

  return out;
}

/** Stable React key / DOM id for a display node. */
export function displayNodeKey(node: DisplayNode): string {
  switch (node.kind) {
    case 'item':
      return node.item.id;
    case 'folder':
      return node.folder.id;
    case 'dropZone':
      return `dropzone:${node.folderId}`;
  }
}
