import { checkStructure } from '../../../domain';
import type { MutationOptions } from '../helpers';
import { isNoopListMove, moveInList } from '../helpers';
import { applyMove, isNoopMove } from '../moves';
import { buildModel, folderItemIds, rootIds } from '../../../test/builders/rowsBuilders';

const defaults: MutationOptions = { expandOnTransfer: true, autoDeleteEmptyFolders: false };
const ROOT = { kind: 'root' } as const;
const IN_F = { kind: 'folder', folderId: 'F' } as const;

describe('moveInList', () => {
  test.each([
    [0, 2, ['b', 'a', 'c']],
    [0, 3, ['b', 'c', 'a']],
    [2, 0, ['c', 'a', 'b']],
    [1, 1, ['a', 'b', 'c']],
    [1, 2, ['a', 'b', 'c']],
    [0, 9, ['a', 'b', 'c']]
  ])('from %i to offset %i', (from, to, expected) => {
    expect(moveInList(['a', 'b', 'c'], from, to)).toEqual(expected);
  });

  test('isNoopListMove agrees with moveInList', () => {
    expect(isNoopListMove(3, 1, 1)).toBe(true);
    expect(isNoopListMove(3, 1, 2)).toBe(true);
    expect(isNoopListMove(3, 1, 3)).toBe(false);
    expect(isNoopListMove(3, 3, 0)).toBe(true);
  });
});

describe('store mutations: moves invariants', () => {
  test('root reorder', () => {
    const model = buildModel(['a', 'b', { folder: 'F' }, 'e']);
    applyMove(model, { kind: 'reorder', context: ROOT, from: 0, to: 3 }, defaults);
    expect(rootIds(model)).toEqual(['b', 'F', 'a', 'e']);
  });

  test('folder reorder', () => {
    const model = buildModel([{ folder: 'F', items: ['c', 'd', 'x'], expanded: true }]);
    applyMove(model, { kind: 'reorder', context: IN_F, from: 0, to: 3 }, defaults);
    expect(folderItemIds(model, 'F')).toEqual(['d', 'x', 'c']);
  });

  test('folderReorder moves the folder reference only', () => {
    const model = buildModel(['a', { folder: 'F', items: ['c'] }, 'e']);
    applyMove(model, { kind: 'folderReorder', from: 1, to: 0 }, defaults);
    expect(rootIds(model)).toEqual(['F', 'a', 'e']);
    expect(folderItemIds(model, 'F')).toEqual(['c']);
  });

  test('folderReorder from a non-folder slot is ignored', () => {
    const model = buildModel(['a', { folder: 'F' }]);
    const op = { kind: 'folderReorder', from: 0, to: 2 } as const;
    expect(isNoopMove(model, op)).toBe(true);
    applyMove(model, op, defaults);
    expect(rootIds(model)).toEqual(['a', 'F']);
  });

  test('transfer into a folder position expands the folder', () => {
    const model = buildModel(['a', { folder: 'F', items: ['c', 'd'] }]);
    applyMove(model, { kind: 'transfer', itemId: 'a', from: ROOT, to: IN_F, insertAt: 1 }, defaults);

    expect(rootIds(model)).toEqual(['F']);
    expect(folderItemIds(model, 'F')).toEqual(['c', 'a', 'd']);
    expect(model.folders.F.isExpanded).toBe(true);
    expect(checkStructure(model)).toEqual([]);
  });

  test('transfer to the root at an index computed before removal', () => {
    const model = buildModel(['a', { folder: 'F', items: ['c', 'd'], expanded: true }, 'e']);
    applyMove(model, { kind: 'transfer', itemId: 'c', from: IN_F, to: ROOT, insertAt: 2 }, defaults);

    expect(rootIds(model)).toEqual(['a', 'F', 'c', 'e']);
    expect(folderItemIds(model, 'F')).toEqual(['d']);
  });

  test('insert positions are clamped and a missing one appends', () => {
    const model = buildModel(['a', 'b', { folder: 'F', items: ['c'] }]);
    applyMove(model, { kind: 'transfer', itemId: 'a', from: ROOT, to: IN_F, insertAt: 99 }, defaults);
    applyMove(model, { kind: 'transfer', itemId: 'b', from: ROOT, to: IN_F }, defaults);
    expect(folderItemIds(model, 'F')).toEqual(['c', 'a', 'b']);
  });

  test('transfer out of the last item deletes the folder when configured', () => {
    const model = buildModel(['a', { folder: 'F', items: ['c'], expanded: true }]);
    applyMove(
      model,
      { kind: 'transfer', itemId: 'c', from: IN_F, to: ROOT, insertAt: 0 },
      { ...defaults, autoDeleteEmptyFolders: true }
    );
    expect(rootIds(model)).toEqual(['c', 'a']);
    expect(model.folders).toEqual({});
  });

  test('isNoopMove', () => {
    const model = buildModel(['a', 'b', { folder: 'F', items: ['c', 'd'] }]);
    expect(isNoopMove(model, { kind: 'invalid', reason: 'x' })).toBe(true);
    expect(isNoopMove(model, { kind: 'reorder', context: ROOT, from: 0, to: 1 })).toBe(true);
    expect(isNoopMove(model, { kind: 'reorder', context: ROOT, from: 0, to: 2 })).toBe(false);
    expect(isNoopMove(model, { kind: 'reorder', context: IN_F, from: 1, to: 2 })).toBe(true);
    expect(isNoopMove(model, { kind: 'reorder', context: { kind: 'folder', folderId: 'G' }, from: 0, to: 1 })).toBe(true);
    expect(isNoopMove(model, { kind: 'transfer', itemId: 'a', from: ROOT, to: IN_F })).toBe(false);
    expect(isNoopMove(model, { kind: 'transfer', itemId: 'zz', from: ROOT, to: IN_F })).toBe(true);
    expect(isNoopMove(model, { kind: 'transfer', itemId: 'a', from: ROOT, to: { kind: 'folder', folderId: 'G' } })).toBe(true);
  });

  test('invalid ops leave the model untouched', () => {
    const model = buildModel(['a']);
    const before = model.root;
    applyMove(model, { kind: 'invalid', reason: 'nope' }, defaults);
    expect(model.root).toBe(before);
  });
});
