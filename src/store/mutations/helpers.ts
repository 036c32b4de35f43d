import type { Folder, Item, ItemContext, RootEntry, RowsModel } from '../../domain';
import { findItemLocation, rootIndexOfFolder } from '../../domain';
import type { ItemLocation } from '../../domain';

export type MutationOptions = {
  /** Expand a folder when an item is moved into it. */
  expandOnTransfer: boolean;
  /** Delete a folder once its last item has been moved out or deleted. */
  autoDeleteEmptyFolders: boolean;
};

export function getFolder(model: RowsModel, folderId: string): Folder {
  const folder = model.folders[folderId];
  if (!folder) throw new Error(`Folder not found: ${folderId}`);
  return folder;
}

export function getItemLocation(model: RowsModel, itemId: string): ItemLocation {
  const location = findItemLocation(model, itemId);
  if (!location) throw new Error(`Item not found: ${itemId}`);
  return location;
}

// -------------------------
// The only three writers of `model.folders`. The root sequence holds folder ids,
// so keeping table writes here keeps both sides in step.
// -------------------------

/** Replace an existing folder's value (contents, name, expanded state). */
export function writeFolder(model: RowsModel, folder: Folder): void {
  getFolder(model, folder.id);
  model.folders[folder.id] = folder;
}

/** Add a new folder to the table and reference it from the root sequence. */
export function insertFolder(model: RowsModel, folder: Folder, rootIndex = model.root.length): void {
  if (model.folders[folder.id]) throw new Error(`Folder already exists: ${folder.id}`);
  model.folders = { ...model.folders, [folder.id]: folder };
  const at = clamp(rootIndex, 0, model.root.length);
  model.root = [...model.root.slice(0, at), { kind: 'folder', folderId: folder.id }, ...model.root.slice(at)];
}

/** Remove a folder from both sides, splicing `replacement` into its root slot. */
export function dropFolder(model: RowsModel, folderId: string, replacement: RootEntry[] = []): void {
  getFolder(model, folderId);
  const at = rootIndexOfFolder(model, folderId);
  if (at >= 0) {
    model.root = [...model.root.slice(0, at), ...replacement, ...model.root.slice(at + 1)];
  }
  const rest = { ...model.folders };
  delete rest[folderId];
  model.folders = rest;
}

// -------------------------
// List helpers
// -------------------------

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * Moves `list[from]` so that it lands before the entry currently at offset `to`
 * (`0..length`). Offsets after the source shift down by one once it is removed.
 */
export function moveInList<T>(list: readonly T[], from: number, to: number): T[] {
  const next = [...list];
  if (from < 0 || from >= list.length || to < 0 || to > list.length) return next;
  const dest = to > from ? to - 1 : to;
  if (dest === from) return next;
  const [moved] = next.splice(from, 1);
  next.splice(dest, 0, moved);
  return next;
}

/** Whether `moveInList(list, from, to)` leaves the list as it is. */
export function isNoopListMove(length: number, from: number, to: number): boolean {
  if (from < 0 || from >= length || to < 0 || to > length) return true;
  return (to > from ? to - 1 : to) === from;
}

// -------------------------
// Item placement
// -------------------------

export function removeItemAt(model: RowsModel, location: ItemLocation): void {
  const { context, index } = location;
  if (context.kind === 'root') {
    model.root = model.root.filter((_, i) => i !== index);
    return;
  }
  const folder = getFolder(model, context.folderId);
  writeFolder(model, { ...folder, contents: folder.contents.filter((_, i) => i !== index) });
}

/** Inserts at `insertAt` clamped to the destination's length, or appends when omitted. */
export function insertItem(
  model: RowsModel,
  item: Item,
  context: ItemContext,
  insertAt: number | undefined,
  options: Pick<MutationOptions, 'expandOnTransfer'>
): void {
  if (context.kind === 'root') {
    const at = clamp(insertAt ?? model.root.length, 0, model.root.length);
    const entry: RootEntry = { kind: 'item', item };
    model.root = [...model.root.slice(0, at), entry, ...model.root.slice(at)];
    return;
  }

  const folder = getFolder(model, context.folderId);
  const at = clamp(insertAt ?? folder.contents.length, 0, folder.contents.length);
  writeFolder(model, {
    ...folder,
    contents: [...folder.contents.slice(0, at), item, ...folder.contents.slice(at)],
    isExpanded: options.expandOnTransfer ? true : folder.isExpanded
  });
}

/** Drops a folder left empty by a move, when the option asks for it. */
export function tidyEmptiedFolder(model: RowsModel, from: ItemContext, options: Pick<MutationOptions, 'autoDeleteEmptyFolders'>): void {
  if (!options.autoDeleteEmptyFolders || from.kind !== 'folder') return;
  const folder = model.folders[from.folderId];
  if (folder && folder.contents.length === 0) dropFolder(model, folder.id);
}
