import { useState } from 'react';
import type * as React from 'react';

import type { DisplayNode, DropPosition } from '../../domain';
import { displayNodeKey } from '../../domain';
import type { DebugLog } from '../../store';
import type { RowDropSide } from './dndUtils';
import { DND_ROW_MIME, dropPositionFromPointer, isRowDrag, parseDraggedRowKey, toDragTarget } from './dndUtils';

type Options = {
  node: DisplayNode;
  /** Display index of this row. */
  index: number;
  /** Rows only drag while the list is in edit mode. */
  enabled: boolean;
  onDropRow: (sourceKey: string, target: number, dropPosition: DropPosition) => void;
  log: DebugLog;
};

type Result = {
  draggable: boolean;
  dropSide: RowDropSide | null;
  onDragStart: (e: React.DragEvent<HTMLDivElement>) => void;
  onDragOver: (e: React.DragEvent<HTMLDivElement>) => void;
  onDragLeave: () => void;
  onDrop: (e: React.DragEvent<HTMLDivElement>) => void;
};

/** Native DnD handlers for one row of the rows-and-folders list. */
export function useRowDnd({ node, index, enabled, onDropRow, log }: Options): Result {
  const [dropSide, setDropSide] = useState<RowDropSide | null>(null);

  // Drop zones are anchors, never drag sources.
  const draggable = enabled && node.kind !== 'dropZone';

  const sideFor = (e: React.DragEvent<HTMLDivElement>): RowDropSide => {
    if (node.kind === 'dropZone') return 'before';
    const rect = e.currentTarget.getBoundingClientRect();
    return dropPositionFromPointer(e.clientY, rect, node.kind === 'folder');
  };

  const onDragStart = (e: React.DragEvent<HTMLDivElement>) => {
    if (!draggable) return;
    const key = displayNodeKey(node);
    try {
      e.dataTransfer.setData(DND_ROW_MIME, key);
      e.dataTransfer.setData('text/plain', key);
      e.dataTransfer.effectAllowed = 'move';
    } catch (err) {
      log('row dragstart: could not write payload', err);
    }
    log('row dragstart', { key, index });
  };

  const onDragOver = (e: React.DragEvent<HTMLDivElement>) => {
    if (!enabled || !isRowDrag(e.dataTransfer)) return;
    e.preventDefault();
    if (e.dataTransfer) e.dataTransfer.dropEffect = 'move';
    const side = sideFor(e);
    if (side !== dropSide) setDropSide(side);
  };

  const onDragLeave = () => setDropSide(null);

  const onDrop = (e: React.DragEvent<HTMLDivElement>) => {
    setDropSide(null);
    if (!enabled) return;
    const sourceKey = parseDraggedRowKey(e.dataTransfer);
    if (!sourceKey) return;
    e.preventDefault();
    e.stopPropagation();

    const { target, dropPosition } = toDragTarget(index, sideFor(e));
    log('row drop', { sourceKey, target, dropPosition });
    onDropRow(sourceKey, target, dropPosition);
  };

  return { draggable, dropSide, onDragStart, onDragOver, onDragLeave, onDrop };
}
