import { SeedError } from './errors';
import { createId } from './id';
import type { Folder, FolderSeed, Item, ItemSeed, RootEntry, RowsModel } from './types';

function requireNonBlank(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new Error(`${field} must be a non-empty string`);
  }
}

export function createItem(name: string, id?: string): Item {
  requireNonBlank(name, 'Item.name');
  return { id: id ?? createId('item'), name: name.trim() };
}

export function createFolder(name: string, contents: Item[] = [], isExpanded = false, id?: string): Folder {
  requireNonBlank(name, 'Folder.name');
  return {
    id: id ?? createId('folder'),
    name: name.trim(),
    contents,
    isExpanded
  };
}

export function createEmptyModel(): RowsModel {
  return { root: [], folders: {} };
}

/**
 * Builds a model from host-provided seeds.
 *
 * Items are laid out at the root in the given order. Folders carrying a
 * `position` are then inserted in ascending position order (each position is
 * clamped to the current root length); the remaining folders are appended.
 * Duplicate ids and blank names throw `SeedError`.
 */
export function createModelFromSeed(seedItems: readonly ItemSeed[], seedFolders: readonly FolderSeed[]): RowsModel {
  const seen = new Set<string>();
  const claim = (id: string): void => {
    if (seen.has(id)) throw new SeedError({ kind: 'duplicateId', id });
    seen.add(id);
  };

  const requireSeedName = (seed: ItemSeed | FolderSeed, entry: 'item' | 'folder'): void => {
    if (seed.name.trim().length === 0) throw new SeedError({ kind: 'blankName', entry, id: seed.id });
  };

  const itemFromSeed = (seed: ItemSeed): Item => {
    requireSeedName(seed, 'item');
    const item = createItem(seed.name, seed.id);
    claim(item.id);
    return item;
  };

  const root: RootEntry[] = seedItems.map((seed): RootEntry => ({ kind: 'item', item: itemFromSeed(seed) }));
  const folders: Record<string, Folder> = {};

  const built = seedFolders.map((seed, order) => {
    requireSeedName(seed, 'folder');
    const contents = (seed.contents ?? []).map(itemFromSeed);
    const folder = createFolder(seed.name, contents, seed.isExpanded ?? false, seed.id);
    claim(folder.id);
    folders[folder.id] = folder;
    return { folder, position: seed.position, order };
  });

  const positioned = built
    .filter((b): b is typeof b & { position: number } => typeof b.position === 'number')
    .sort((a, b) => a.position - b.position || a.order - b.order);

  for (const { folder, position } of positioned) {
    const at = Math.max(0, Math.min(Math.trunc(position), root.length));
    root.splice(at, 0, { kind: 'folder', folderId: folder.id });
  }

  for (const { folder, position } of built) {
    if (typeof position === 'number') continue;
    root.push({ kind: 'folder', folderId: folder.id });
  }

  return { root, folders };
}
