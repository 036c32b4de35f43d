export { RowsAndFoldersList } from './RowsAndFoldersList';
export { dropPositionFromPointer, toDragTarget, DND_ROW_MIME } from './dndUtils';
export type { RowDropSide, RowRect } from './dndUtils';
