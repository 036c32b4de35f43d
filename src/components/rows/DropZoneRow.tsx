import { ACCENT_COLOR } from '../../domain';

type Props = {
  folderName: string;
  isActive: boolean;
};

/** Sentinel row closing a folder block. Dropping an item here files it into the folder. */
export function DropZoneRow({ folderName, isActive }: Props) {
  return (
    <div
      className={isActive ? 'rowsDropZone isDropTarget' : 'rowsDropZone'}
      style={isActive ? { borderColor: ACCENT_COLOR } : undefined}
    >
      {`Drop into ${folderName}`}
    </div>
  );
}
