import type { Folder, Item, ItemContext, RowsModel } from '../types';

/**
 * Reads a folder from the folder table.
 *
 * A root reference without a table entry is a structural defect (asserted by
 * the store in strict mode). Readers absorb it by treating the folder as empty
 * and collapsed so the display list and the index mapper stay consistent.
 */
export function lookupFolder(model: RowsModel, folderId: string): Folder {
  return model.folders[folderId] ?? { id: folderId, name: folderId, contents: [], isExpanded: false };
}

/** Folders in root order (the order a "Move to folder" menu lists them). */
export function listFolders(model: RowsModel): Folder[] {
  const out: Folder[] = [];
  for (const entry of model.root) {
    if (entry.kind !== 'folder') continue;
    const folder = model.folders[entry.folderId];
    if (folder) out.push(folder);
  }
  return out;
}

export type ItemLocation = {
  item: Item;
  context: ItemContext;
  /** Index in the root sequence or in the folder's contents. */
  index: number;
};

export function findItemLocation(model: RowsModel, itemId: string): ItemLocation | null {
  for (let i = 0; i < model.root.length; i++) {
    const entry = model.root[i];
    if (entry.kind === 'item' && entry.item.id === itemId) {
      return { item: entry.item, context: { kind: 'root' }, index: i };
    }
  }
  for (const folder of Object.values(model.folders)) {
    const index = folder.contents.findIndex((item) => item.id === itemId);
    if (index >= 0) {
      return { item: folder.contents[index], context: { kind: 'folder', folderId: folder.id }, index };
    }
  }
  return null;
}

export function rootIndexOfFolder(model: RowsModel, folderId: string): number {
  return model.root.findIndex((entry) => entry.kind === 'folder' && entry.folderId === folderId);
}

export function sameContext(a: ItemContext, b: ItemContext): boolean {
  if (a.kind === 'root' || b.kind === 'root') return a.kind === b.kind;
  return a.folderId === b.folderId;
}
