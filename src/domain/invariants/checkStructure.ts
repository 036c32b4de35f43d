import { StructuralViolationError } from '../errors';
import type { StructureIssue } from '../errors';
import type { RowsModel } from '../types';

/**
 * Lists every way the root sequence and the folder table disagree, plus items
 * owned by more than one container. An empty list means the model is sound.
 */
export function checkStructure(model: RowsModel): StructureIssue[] {
  const issues: StructureIssue[] = [];
  const referenced = new Set<string>();
  const seenItems = new Set<string>();

  const noteItem = (itemId: string) => {
    if (seenItems.has(itemId)) issues.push({ kind: 'duplicateItem', itemId });
    seenItems.add(itemId);
  };

  for (const entry of model.root) {
    if (entry.kind === 'item') {
      noteItem(entry.item.id);
      continue;
    }
    if (referenced.has(entry.folderId)) {
      issues.push({ kind: 'duplicateFolderRef', folderId: entry.folderId });
      continue;
    }
    referenced.add(entry.folderId);
    if (!model.folders[entry.folderId]) issues.push({ kind: 'missingFolder', folderId: entry.folderId });
  }

  for (const [key, folder] of Object.entries(model.folders)) {
    if (folder.id !== key) issues.push({ kind: 'folderIdMismatch', folderId: key });
    if (!referenced.has(key)) issues.push({ kind: 'orphanFolder', folderId: key });
    for (const item of folder.contents) noteItem(item.id);
  }

  return issues;
}

export function assertStructure(model: RowsModel): void {
  const issues = checkStructure(model);
  if (issues.length > 0) throw new StructuralViolationError(issues);
}
