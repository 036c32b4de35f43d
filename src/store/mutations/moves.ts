import type { MoveOp, RowsModel } from '../../domain';
import { findItemLocation } from '../../domain';
import type { MutationOptions } from './helpers';
import { getFolder, insertItem, isNoopListMove, moveInList, removeItemAt, tidyEmptiedFolder, writeFolder } from './helpers';

/** True when applying `op` would leave the model as it is. */
export function isNoopMove(model: RowsModel, op: MoveOp): boolean {
  switch (op.kind) {
    case 'invalid':
      return true;
    case 'folderReorder':
      return model.root[op.from]?.kind !== 'folder' || isNoopListMove(model.root.length, op.from, op.to);
    case 'reorder': {
      if (op.context.kind === 'root') return isNoopListMove(model.root.length, op.from, op.to);
      const folder = model.folders[op.context.folderId];
      return !folder || isNoopListMove(folder.contents.length, op.from, op.to);
    }
    case 'transfer': {
      const location = findItemLocation(model, op.itemId);
      if (!location) return true;
      return op.to.kind === 'folder' && !model.folders[op.to.folderId];
    }
  }
}

/**
 * Applies a resolved move to a draft model.
 *
 * Transfers remove the item first and then insert it at the position the
 * resolver computed against the unmodified model.
 */
export function applyMove(model: RowsModel, op: MoveOp, options: MutationOptions): void {
  switch (op.kind) {
    case 'invalid':
      return;

    case 'folderReorder': {
      if (model.root[op.from]?.kind !== 'folder') return;
      model.root = moveInList(model.root, op.from, op.to);
      return;
    }

    case 'reorder': {
      if (op.context.kind === 'root') {
        model.root = moveInList(model.root, op.from, op.to);
        return;
      }
      const folder = getFolder(model, op.context.folderId);
      writeFolder(model, { ...folder, contents: moveInList(folder.contents, op.from, op.to) });
      return;
    }

    case 'transfer': {
      const location = findItemLocation(model, op.itemId);
      if (!location) return;
      if (op.to.kind === 'folder') getFolder(model, op.to.folderId);

      removeItemAt(model, location);
      insertItem(model, location.item, op.to, op.insertAt, options);
      tidyEmptiedFolder(model, location.context, options);
      return;
    }
  }
}
