import { displayIndexToRootIndex, folderSpan, locateContextIn } from '../display/indexMapper';
import { projectDisplayList } from '../display/projectDisplayList';
import { rootIndexOfFolder, sameContext } from '../selectors/folders';
import type { DisplayNode, DropPosition, ItemContext, MoveOp, RowsModel } from '../types';

export type ResolveMoveOptions = {
  includeDropZones: boolean;
  dropPosition?: DropPosition;
};

const ROOT: ItemContext = { kind: 'root' };

function invalid(reason: string): MoveOp {
  return { kind: 'invalid', reason };
}

/**
 * The folder a drop lands "into": a drop-zone sentinel at the target offset,
 * or a folder row the item was dropped onto.
 */
function dropTargetFolderId(display: readonly DisplayNode[], target: number, dropPosition: DropPosition): string | null {
  const node = display[target];
  if (!node) return null;
  if (node.kind === 'dropZone') return node.folderId;
  if (node.kind === 'folder' && dropPosition === 'on') return node.folder.id;
  return null;
}

/**
 * Classifies a drag from display row `source` to insertion offset `target`.
 *
 * Both indices address the display list projected with `includeDropZones`;
 * `target` ranges over `0..length` and means "insert before the row currently
 * at that index". Every position is computed against the model as it is now,
 * before anything is removed.
 */
export function resolveMove(model: RowsModel, source: number, target: number, options: ResolveMoveOptions): MoveOp {
  const { includeDropZones } = options;
  const dropPosition = options.dropPosition ?? 'between';
  const display = projectDisplayList(model, includeDropZones);

  if (!Number.isInteger(source) || source < 0 || source >= display.length) {
    return invalid(`source ${source} is outside the display list`);
  }
  if (!Number.isInteger(target) || target < 0 || target > display.length) {
    return invalid(`target ${target} is outside the display list`);
  }

  const node = display[source];

  if (node.kind === 'dropZone') return invalid('drop zones cannot be moved');

  if (node.kind === 'folder') {
    return {
      kind: 'folderReorder',
      from: displayIndexToRootIndex(model, source, includeDropZones),
      to: displayIndexToRootIndex(model, target, includeDropZones)
    };
  }

  const itemId = node.item.id;
  const sourceContext = locateContextIn(display, source);

  const intoFolderId = dropTargetFolderId(display, target, dropPosition);
  if (intoFolderId) {
    if (sourceContext.kind === 'folder' && sourceContext.folderId === intoFolderId) {
      // Dropping an item on its own folder takes it out, right below the folder.
      return {
        kind: 'transfer',
        itemId,
        from: sourceContext,
        to: ROOT,
        insertAt: rootIndexOfFolder(model, intoFolderId) + 1
      };
    }
    return { kind: 'transfer', itemId, from: sourceContext, to: { kind: 'folder', folderId: intoFolderId } };
  }

  let targetContext = locateContextIn(display, target);
  const sourceSpan =
    sourceContext.kind === 'folder' ? folderSpan(model, sourceContext.folderId, includeDropZones) : undefined;

  // The offset right after a folder's last item reads as "next root row"; for
  // an item of that folder it means "move to the end of the folder".
  if (sourceSpan && target === sourceSpan.end) {
    targetContext = sourceContext;
  }

  if (sameContext(sourceContext, targetContext)) {
    if (sourceSpan) {
      return { kind: 'reorder', context: sourceContext, from: source - sourceSpan.start, to: target - sourceSpan.start };
    }
    return {
      kind: 'reorder',
      context: ROOT,
      from: displayIndexToRootIndex(model, source, includeDropZones),
      to: displayIndexToRootIndex(model, target, includeDropZones)
    };
  }

  if (targetContext.kind === 'root') {
    return {
      kind: 'transfer',
      itemId,
      from: sourceContext,
      to: ROOT,
      insertAt: displayIndexToRootIndex(model, target, includeDropZones)
    };
  }

  const targetSpan = folderSpan(model, targetContext.folderId, includeDropZones);
  if (!targetSpan) return invalid(`folder ${targetContext.folderId} is not expanded`);
  const contentCount = targetSpan.end - targetSpan.start;

  return {
    kind: 'transfer',
    itemId,
    from: sourceContext,
    to: targetContext,
    insertAt: Math.max(0, Math.min(target - targetSpan.start, contentCount))
  };
}
