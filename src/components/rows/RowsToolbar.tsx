import { Button } from 'react-aria-components';

type Props = {
  isEditing: boolean;
  onToggleEditing: () => void;
  onAddFolder: () => void;
  onAddItem: () => void;
};

export function RowsToolbar({ isEditing, onToggleEditing, onAddFolder, onAddItem }: Props) {
  return (
    <div className="rowsToolbar" role="toolbar" aria-label="Rows actions">
      <Button className="shellButton" onPress={onAddFolder}>
        New Folder
      </Button>
      <Button className="shellButton" onPress={onAddItem}>
        New Row
      </Button>
      <Button className="shellButton" onPress={onToggleEditing}>
        {isEditing ? 'Done' : 'Edit'}
      </Button>
    </div>
  );
}
