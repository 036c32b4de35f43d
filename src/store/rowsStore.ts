import type { DisplayNode, DropPosition, Folder, FolderSeed, ItemSeed, MoveOp, RowsModel } from '../domain';
import {
  SAMPLE_FOLDERS,
  SAMPLE_ITEMS,
  assertStructure,
  createEmptyModel,
  createModelFromSeed,
  findItemLocation,
  listFolders,
  nextFolderName,
  nextItemName,
  projectDisplayList,
  resolveMove
} from '../domain';
import type { DebugLog } from './debugLog';
import { createDebugLog, isDebugFlagSet } from './debugLog';
import { folderMutations, itemMutations, moveMutations } from './mutations';
import type { RowsStoreOptions } from './options';
import { resolveRowsStoreOptions } from './options';

export type RowsStoreState = {
  model: RowsModel;
  /** The op the last drag resolved to. An invalid op tells the renderer to snap back. */
  lastMove: MoveOp | null;
};

export type DragOptions = {
  /** Which display list the indices refer to. Defaults to the store option. */
  includeDropZones?: boolean;
  dropPosition?: DropPosition;
};

type Listener = () => void;

type CachedDisplayList = { model: RowsModel; list: DisplayNode[] };

export class RowsStore {
  readonly options: RowsStoreOptions;

  private state: RowsStoreState = {
    model: createEmptyModel(),
    lastMove: null
  };

  private listeners = new Set<Listener>();
  private displayCache = new Map<boolean, CachedDisplayList>();
  private readonly log: DebugLog;

  constructor(options?: Partial<RowsStoreOptions>) {
    this.options = resolveRowsStoreOptions(options);
    this.log = createDebugLog('store', this.options.debug || isDebugFlagSet());
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getState(): RowsStoreState {
    return this.state;
  }

  private setState(next: Partial<RowsStoreState>): void {
    this.state = { ...this.state, ...next };
    for (const l of this.listeners) l();
  }

  private commit(model: RowsModel, extra: Omit<Partial<RowsStoreState>, 'model'> = {}): void {
    if (this.options.strictInvariants) assertStructure(model);
    this.setState({ ...extra, model });
  }

  /** Single write path: every change runs against a shallow draft and is published at once. */
  private updateModel(mutator: (model: RowsModel) => void, extra?: Omit<Partial<RowsStoreState>, 'model'>): void {
    const current = this.state.model;
    const draft: RowsModel = {
      root: [...current.root],
      folders: { ...current.folders }
    };

    mutator(draft);
    this.commit(draft, extra);
  }

  private hasFolder(folderId: string, action: string): boolean {
    if (this.state.model.folders[folderId]) return true;
    this.log(`${action}: folder not found`, folderId);
    return false;
  }

  private hasItem(itemId: string, action: string): boolean {
    if (findItemLocation(this.state.model, itemId)) return true;
    this.log(`${action}: item not found`, itemId);
    return false;
  }

  // -------------------------
  // Lifecycle
  // -------------------------

  /** Replace the model with host-provided seeds. Throws `SeedError` on duplicate ids. */
  initialize(seedItems: readonly ItemSeed[], seedFolders: readonly FolderSeed[]): void {
    this.commit(createModelFromSeed(seedItems, seedFolders), { lastMove: null });
  }

  loadSample(): void {
    this.initialize(SAMPLE_ITEMS, SAMPLE_FOLDERS);
  }

  reset(): void {
    this.setState({ model: createEmptyModel(), lastMove: null });
  }

  // -------------------------
  // Reads
  // -------------------------

  /** Same array for the same model, so it can be handed to React as a snapshot. */
  getDisplayList(includeDropZones = this.options.includeDropZones): DisplayNode[] {
    const { model } = this.state;
    const cached = this.displayCache.get(includeDropZones);
    if (cached && cached.model === model) return cached.list;

    const list = projectDisplayList(model, includeDropZones);
    this.displayCache.set(includeDropZones, { model, list });
    return list;
  }

  listFolders(): Folder[] {
    return listFolders(this.state.model);
  }

  // -------------------------
  // Folders
  // -------------------------

  addFolder(name?: string): string {
    let created = '';
    this.updateModel((model) => {
      const label = name?.trim() || nextFolderName(model);
      created = folderMutations.addFolder(model, label);
    });
    return created;
  }

  toggleFolder(folderId: string): void {
    if (!this.hasFolder(folderId, 'toggleFolder')) return;
    this.updateModel((model) => folderMutations.toggleFolder(model, folderId));
  }

  setFolderExpanded(folderId: string, isExpanded: boolean): void {
    if (!this.hasFolder(folderId, 'setFolderExpanded')) return;
    this.updateModel((model) => folderMutations.setFolderExpanded(model, folderId, isExpanded));
  }

  renameFolder(folderId: string, name: string): void {
    if (!this.hasFolder(folderId, 'renameFolder')) return;
    if (!name.trim()) {
      this.log('renameFolder: blank name ignored', folderId);
      return;
    }
    this.updateModel((model) => folderMutations.renameFolder(model, folderId, name));
  }

  /** Delete a folder; its items move to the root in the folder's former slot. */
  deleteFolder(folderId: string): void {
    if (!this.hasFolder(folderId, 'deleteFolder')) return;
    this.updateModel((model) => folderMutations.deleteFolder(model, folderId));
  }

  // -------------------------
  // Items
  // -------------------------

  addItem(name?: string): string {
    let created = '';
    this.updateModel((model) => {
      const label = name?.trim() || nextItemName(model);
      created = itemMutations.addItem(model, label);
    });
    return created;
  }

  renameItem(itemId: string, name: string): void {
    if (!this.hasItem(itemId, 'renameItem')) return;
    if (!name.trim()) {
      this.log('renameItem: blank name ignored', itemId);
      return;
    }
    this.updateModel((model) => itemMutations.renameItem(model, itemId, name));
  }

  deleteItem(itemId: string): void {
    if (!this.hasItem(itemId, 'deleteItem')) return;
    this.updateModel((model) => itemMutations.deleteItem(model, itemId, this.options));
  }

  moveItemToFolder(itemId: string, folderId: string): void {
    if (!this.hasItem(itemId, 'moveItemToFolder') || !this.hasFolder(folderId, 'moveItemToFolder')) return;
    const location = findItemLocation(this.state.model, itemId);
    if (location?.context.kind === 'folder' && location.context.folderId === folderId) return;
    this.updateModel((model) => itemMutations.moveItemToFolder(model, itemId, folderId, this.options));
  }

  removeItemFromFolder(itemId: string): void {
    if (!this.hasItem(itemId, 'removeItemFromFolder')) return;
    if (findItemLocation(this.state.model, itemId)?.context.kind !== 'folder') return;
    this.updateModel((model) => itemMutations.removeItemFromFolder(model, itemId, this.options));
  }

  // -------------------------
  // Drag and drop
  // -------------------------

  /**
   * Resolve a drag from display row `source` to insertion offset `target` and
   * apply it. Invalid and no-op moves leave the model untouched.
   */
  handleDrag(source: number, target: number, options: DragOptions = {}): MoveOp {
    const model = this.state.model;
    const op = resolveMove(model, source, target, {
      includeDropZones: options.includeDropZones ?? this.options.includeDropZones,
      dropPosition: options.dropPosition
    });
    this.log('handleDrag', { source, target, dropPosition: options.dropPosition ?? 'between', op });

    if (moveMutations.isNoopMove(model, op)) {
      this.setState({ lastMove: op });
      return op;
    }

    this.updateModel((draft) => moveMutations.applyMove(draft, op, this.options), { lastMove: op });
    return op;
  }
}

/** Factory used by tests and to create isolated store instances. */
export function createRowsStore(options?: Partial<RowsStoreOptions>): RowsStore {
  return new RowsStore(options);
}

/** App singleton store instance. */
export const rowsStore = createRowsStore();
