import { Button } from 'react-aria-components';

import type { Folder } from '../../domain';

type Props = {
  folder: Folder;
  isEditing: boolean;
  onToggle: () => void;
  onDelete: () => void;
};

export function FolderRow({ folder, isEditing, onToggle, onDelete }: Props) {
  const action = folder.isExpanded ? 'Collapse' : 'Expand';

  return (
    <div className="rowsFolder">
      <Button
        className="rowsFolderToggle"
        aria-label={`${action} ${folder.name}`}
        aria-expanded={folder.isExpanded}
        onPress={onToggle}
      >
        <span aria-hidden="true">{folder.isExpanded ? '▾' : '▸'}</span>
      </Button>
      <span className="rowsLabel">{folder.name}</span>
      <span className="rowsSecondary">{`${folder.contents.length} items`}</span>

      {isEditing ? (
        <Button className="miniButton" aria-label={`Delete ${folder.name}`} onPress={onDelete}>
          ×
        </Button>
      ) : null}
    </div>
  );
}
