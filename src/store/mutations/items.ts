import type { RootEntry, RowsModel } from '../../domain';
import { createItem, rootIndexOfFolder } from '../../domain';
import type { MutationOptions } from './helpers';
import { getFolder, getItemLocation, insertItem, removeItemAt, tidyEmptiedFolder, writeFolder } from './helpers';

/** New items always start at the end of the root sequence. */
export function addItem(model: RowsModel, name: string, id?: string): string {
  const item = createItem(name, id);
  model.root = [...model.root, { kind: 'item', item }];
  return item.id;
}

export function renameItem(model: RowsModel, itemId: string, name: string): void {
  const trimmed = name.trim();
  if (!trimmed) return;

  const { item, context, index } = getItemLocation(model, itemId);
  const renamed = { ...item, name: trimmed };

  if (context.kind === 'root') {
    model.root = model.root.map((entry, i): RootEntry => (i === index ? { kind: 'item', item: renamed } : entry));
    return;
  }
  const folder = getFolder(model, context.folderId);
  writeFolder(model, { ...folder, contents: folder.contents.map((it, i) => (i === index ? renamed : it)) });
}

export function deleteItem(model: RowsModel, itemId: string, options: Pick<MutationOptions, 'autoDeleteEmptyFolders'>): void {
  const location = getItemLocation(model, itemId);
  removeItemAt(model, location);
  tidyEmptiedFolder(model, location.context, options);
}

/** Appends the item to the folder. Already in that folder: nothing to do. */
export function moveItemToFolder(model: RowsModel, itemId: string, folderId: string, options: MutationOptions): void {
  getFolder(model, folderId);
  const location = getItemLocation(model, itemId);
  if (location.context.kind === 'folder' && location.context.folderId === folderId) return;

  removeItemAt(model, location);
  insertItem(model, location.item, { kind: 'folder', folderId }, undefined, options);
  tidyEmptiedFolder(model, location.context, options);
}

/** Takes the item out of its folder and places it right below the folder. Root items stay put. */
export function removeItemFromFolder(model: RowsModel, itemId: string, options: MutationOptions): void {
  const location = getItemLocation(model, itemId);
  if (location.context.kind !== 'folder') return;

  const folderRootIndex = rootIndexOfFolder(model, location.context.folderId);
  removeItemAt(model, location);
  insertItem(model, location.item, { kind: 'root' }, folderRootIndex + 1, options);
  tidyEmptiedFolder(model, location.context, options);
}
