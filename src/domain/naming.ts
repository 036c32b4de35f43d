import type { RowsModel } from './types';

const ITEM_NAME_PREFIX = 'Row ';
const FOLDER_NAME_PREFIX = 'Folder ';
// A and B belong to the sample catalog.
const FIRST_FOLDER_SUFFIX = 'C';

/** C -> D, Z -> AA, AZ -> BA, ZZ -> AAA. */
export function incrementLetterSuffix(suffix: string): string {
  const chars = suffix.split('');
  for (let i = chars.length - 1; i >= 0; i--) {
    if (chars[i] < 'Z') {
      chars[i] = String.fromCharCode(chars[i].charCodeAt(0) + 1);
      return chars.join('');
    }
    chars[i] = 'A';
  }
  return `A${chars.join('')}`;
}

export function nextFolderName(model: RowsModel): string {
  const existing = new Set(Object.values(model.folders).map((f) => f.name));
  let suffix = FIRST_FOLDER_SUFFIX;
  while (existing.has(`${FOLDER_NAME_PREFIX}${suffix}`)) {
    suffix = incrementLetterSuffix(suffix);
  }
  return `${FOLDER_NAME_PREFIX}${suffix}`;
}

function rowNumber(name: string): number | null {
  const match = /^Row (\d+)$/.exec(name);
  return match ? Number(match[1]) : null;
}

/** "Row N" with the smallest N >= 1 not used by any item, nested or not. */
export function nextItemName(model: RowsModel): string {
  const used = new Set<number>();
  const note = (name: string) => {
    const n = rowNumber(name);
    if (n !== null) used.add(n);
  };

  for (const entry of model.root) {
    if (entry.kind === 'item') note(entry.item.name);
  }
  for (const folder of Object.values(model.folders)) {
    for (const item of folder.contents) note(item.name);
  }

  let next = 1;
  while (used.has(next)) next++;
  return `${ITEM_NAME_PREFIX}${next}`;
}
