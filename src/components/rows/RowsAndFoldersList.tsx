import { useMemo, useState } from 'react';
import type { ReactElement } from 'react';

import type { DisplayNode, DropPosition, Folder } from '../../domain';
import { displayNodeKey, listFolders } from '../../domain';
import type { DebugLog, RowsStore } from '../../store';
import { createDebugLog, isDebugFlagSet, rowsStore, useDisplayList, useRowsStore } from '../../store';
import { DropZoneRow } from './DropZoneRow';
import { FolderRow } from './FolderRow';
import { ItemRow } from './ItemRow';
import { RowsToolbar } from './RowsToolbar';
import { useRowDnd } from './useRowDnd';

type Props = {
  store?: RowsStore;
  /** Show drop-zone rows after each folder while editing. Defaults to the store option. */
  includeDropZones?: boolean;
  title?: string;
};

type DisplayRowProps = {
  store: RowsStore;
  node: DisplayNode;
  index: number;
  isEditing: boolean;
  folders: Folder[];
  onDropRow: (sourceKey: string, target: number, dropPosition: DropPosition) => void;
  log: DebugLog;
};

function DisplayRow({ store, node, index, isEditing, folders, onDropRow, log }: DisplayRowProps) {
  const dnd = useRowDnd({ node, index, enabled: isEditing, onDropRow, log });

  const renderContent = (): ReactElement => {
    switch (node.kind) {
      case 'item': {
        const { item } = node;
        return (
          <ItemRow
            item={item}
            isNested={node.isNested}
            isEditing={isEditing}
            folders={folders}
            onMoveToFolder={(folderId) => store.moveItemToFolder(item.id, folderId)}
            onRemoveFromFolder={() => store.removeItemFromFolder(item.id)}
          />
        );
      }
      case 'folder': {
        const { folder } = node;
        return (
          <FolderRow
            folder={folder}
            isEditing={isEditing}
            onToggle={() => store.toggleFolder(folder.id)}
            onDelete={() => store.deleteFolder(folder.id)}
          />
        );
      }
      case 'dropZone':
        return (
          <DropZoneRow
            folderName={folders.find((f) => f.id === node.folderId)?.name ?? node.folderId}
            isActive={dnd.dropSide !== null}
          />
        );
    }
  };

  return (
    <div
      role="listitem"
      className="rowsRow"
      data-kind={node.kind}
      data-drop-side={dnd.dropSide ?? undefined}
      draggable={dnd.draggable}
      onDragStart={dnd.onDragStart}
      onDragOver={dnd.onDragOver}
      onDragLeave={dnd.onDragLeave}
      onDrop={dnd.onDrop}
    >
      {renderContent()}
    </div>
  );
}

/**
 * Rows and folders, one level deep.
 *
 * Outside edit mode rows only expand and collapse. In edit mode rows can be
 * dragged (native HTML5 DnD), root rows get a "move to folder" menu and nested
 * rows a "remove from folder" button.
 */
export function RowsAndFoldersList({ store = rowsStore, includeDropZones, title = 'Rows & Folders' }: Props) {
  const [isEditing, setIsEditing] = useState(false);
  const dropZonesVisible = isEditing && (includeDropZones ?? store.options.includeDropZones);

  const display = useDisplayList(store, dropZonesVisible);
  const folders = useRowsStore((state) => listFolders(state.model), store);
  const log = useMemo(() => createDebugLog('list', store.options.debug || isDebugFlagSet()), [store]);

  const onDropRow = (sourceKey: string, target: number, dropPosition: DropPosition) => {
    const source = display.findIndex((node) => displayNodeKey(node) === sourceKey);
    if (source < 0) {
      log('drop ignored: unknown row', sourceKey);
      return;
    }
    store.handleDrag(source, target, { includeDropZones: dropZonesVisible, dropPosition });
  };

  return (
    <section className="rowsAndFolders" aria-label={title}>
      <RowsToolbar
        isEditing={isEditing}
        onToggleEditing={() => setIsEditing((v) => !v)}
        onAddFolder={() => store.addFolder()}
        onAddItem={() => store.addItem()}
      />
      <div role="list" className="rowsList" aria-label={title}>
        {display.map((node, index) => (
          <DisplayRow
            key={displayNodeKey(node)}
            store={store}
            node={node}
            index={index}
            isEditing={isEditing}
            folders={folders}
            onDropRow={onDropRow}
            log={log}
          />
        ))}
      </div>
    </section>
  );
}
