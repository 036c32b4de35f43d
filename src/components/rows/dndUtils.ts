import type { DropPosition } from '../../domain';

// Drag payload: the display key of the dragged row.
export const DND_ROW_MIME = 'application/x-rows-and-folders-row-key';

/** Where the pointer sits inside the hovered row. */
export type RowDropSide = 'before' | 'after' | 'on';

export type RowRect = { top: number; height: number };

/**
 * Folder rows accept drops "on" them in their middle half; every other row is
 * split into before/after halves. Rows without a measurable height (not laid
 * out yet) read as "before".
 */
export function dropPositionFromPointer(clientY: number, rect: RowRect, acceptsOn: boolean): RowDropSide {
  if (!(rect.height > 0) || !Number.isFinite(clientY)) return 'before';
  const offset = (clientY - rect.top) / rect.height;

  if (acceptsOn) {
    if (offset < 0.25) return 'before';
    if (offset > 0.75) return 'after';
    return 'on';
  }
  return offset < 0.5 ? 'before' : 'after';
}

/** Converts a hovered row and side into the insertion offset the store expects. */
export function toDragTarget(rowIndex: number, side: RowDropSide): { target: number; dropPosition: DropPosition } {
  switch (side) {
    case 'before':
      return { target: rowIndex, dropPosition: 'between' };
    case 'after':
      return { target: rowIndex + 1, dropPosition: 'between' };
    case 'on':
      return { target: rowIndex, dropPosition: 'on' };
  }
}

export function parseDraggedRowKey(dt: DataTransfer | null): string | null {
  if (!dt) return null;
  try {
    const key = dt.getData(DND_ROW_MIME);
    return key || null;
  } catch {
    // Some browsers refuse getData() outside of the drop event.
    return null;
  }
}

export function isRowDrag(dt: DataTransfer | null): boolean {
  if (!dt) return false;
  try {
    return Array.from(dt.types ?? []).includes(DND_ROW_MIME);
  } catch {
    return false;
  }
}
