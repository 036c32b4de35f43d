import type { RootEntry, RowsModel } from '../../domain';
import { createFolder } from '../../domain';
import { dropFolder, getFolder, insertFolder, writeFolder } from './helpers';

/** Appends a new, empty, collapsed folder to the root sequence. */
export function addFolder(model: RowsModel, name: string, id?: string): string {
  const folder = createFolder(name, [], false, id);
  insertFolder(model, folder);
  return folder.id;
}

export function setFolderExpanded(model: RowsModel, folderId: string, isExpanded: boolean): void {
  const folder = getFolder(model, folderId);
  if (folder.isExpanded === isExpanded) return;
  writeFolder(model, { ...folder, isExpanded });
}

export function toggleFolder(model: RowsModel, folderId: string): void {
  const folder = getFolder(model, folderId);
  writeFolder(model, { ...folder, isExpanded: !folder.isExpanded });
}

export function renameFolder(model: RowsModel, folderId: string, name: string): void {
  const folder = getFolder(model, folderId);
  const trimmed = name.trim();
  if (!trimmed) return;
  writeFolder(model, { ...folder, name: trimmed });
}

/**
 * Deletes a folder without losing its items: the contents take the folder's
 * root slot, in order.
 */
export function deleteFolder(model: RowsModel, folderId: string): void {
  const folder = getFolder(model, folderId);
  const promoted: RootEntry[] = folder.contents.map((item): RootEntry => ({ kind: 'item', item }));
  dropFolder(model, folderId, promoted);
}
