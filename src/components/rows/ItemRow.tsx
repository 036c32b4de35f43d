import { Button, Menu, MenuItem, MenuTrigger, Popover } from 'react-aria-components';

import type { Folder, Item } from '../../domain';
import { colorForName } from '../../domain';

type Props = {
  item: Item;
  isNested: boolean;
  isEditing: boolean;
  /** Folders offered by the "move to folder" menu, in root order. */
  folders: Folder[];
  onMoveToFolder: (folderId: string) => void;
  onRemoveFromFolder: () => void;
};

export function ItemRow({ item, isNested, isEditing, folders, onMoveToFolder, onRemoveFromFolder }: Props) {
  return (
    <div className={isNested ? 'rowsItem rowsItemNested' : 'rowsItem'}>
      <span className="rowsBadge" aria-hidden="true" style={{ background: colorForName(item.name) }}>
        {item.name.slice(0, 1)}
      </span>
      <span className="rowsLabel">{item.name}</span>

      {isEditing && isNested ? (
        <Button className="miniButton" aria-label={`Remove ${item.name} from folder`} onPress={onRemoveFromFolder}>
          −
        </Button>
      ) : null}

      {isEditing && !isNested && folders.length > 0 ? (
        <MenuTrigger>
          <Button className="miniButton" aria-label={`Add ${item.name} to folder`}>
            ＋
          </Button>
          <Popover className="rowsMenuPopover">
            <Menu className="rowsMenu" aria-label={`Move ${item.name} to`} onAction={(key) => onMoveToFolder(String(key))}>
              {folders.map((folder) => (
                <MenuItem className="rowsMenuItem" key={folder.id} id={folder.id}>
                  {folder.name}
                </MenuItem>
              ))}
            </Menu>
          </Popover>
        </MenuTrigger>
      ) : null}
    </div>
  );
}
