import { resolveMove } from '../moves/resolveMove';
import { buildModel } from '../../test/builders/rowsBuilders';

const ROOT = { kind: 'root' } as const;
const IN_F = { kind: 'folder', folderId: 'F' } as const;

// Display: a(0) b(1) F(2) c(3) d(4) e(5).
// With drop zones: a(0) b(1) F(2) c(3) d(4) dropzone:F(5) e(6).
const model = buildModel(['a', 'b', { folder: 'F', items: ['c', 'd'], expanded: true }, 'e']);
const plain = { includeDropZones: false };
const withZones = { includeDropZones: true };

describe('resolveMove: bounds and sources', () => {
  test.each([
    [-1, 0],
    [6, 0],
    [0, 7],
    [0, -1],
    [1.5, 0]
  ])('source %p target %p is invalid', (source, target) => {
    expect(resolveMove(model, source, target, plain).kind).toBe('invalid');
  });

  test('the end offset is a valid target', () => {
    expect(resolveMove(model, 0, 6, plain)).toEqual({ kind: 'reorder', context: ROOT, from: 0, to: 4 });
  });

  test('drop zones cannot be dragged', () => {
    expect(resolveMove(model, 5, 0, withZones)).toEqual({ kind: 'invalid', reason: 'drop zones cannot be moved' });
  });

  test('an empty model has nothing to drag', () => {
    expect(resolveMove({ root: [], folders: {} }, 0, 0, plain).kind).toBe('invalid');
  });
});

describe('resolveMove: folders', () => {
  test('folder rows reorder in root coordinates', () => {
    expect(resolveMove(model, 2, 0, plain)).toEqual({ kind: 'folderReorder', from: 2, to: 0 });
    expect(resolveMove(model, 2, 6, plain)).toEqual({ kind: 'folderReorder', from: 2, to: 4 });
  });

  test('a target inside an expanded folder maps to the slot after it', () => {
    expect(resolveMove(model, 2, 4, plain)).toEqual({ kind: 'folderReorder', from: 2, to: 3 });
  });

  test('drop position is ignored for folder sources', () => {
    expect(resolveMove(model, 2, 0, { includeDropZones: false, dropPosition: 'on' })).toEqual({
      kind: 'folderReorder',
      from: 2,
      to: 0
    });
  });
});

describe('resolveMove: same context', () => {
  test('root items reorder by root index', () => {
    expect(resolveMove(model, 0, 2, plain)).toEqual({ kind: 'reorder', context: ROOT, from: 0, to: 2 });
  });

  test('dropping below an expanded folder lands after the whole folder', () => {
    expect(resolveMove(model, 0, 5, plain)).toEqual({ kind: 'reorder', context: ROOT, from: 0, to: 3 });
  });

  test('folder items reorder by folder position', () => {
    expect(resolveMove(model, 4, 3, plain)).toEqual({ kind: 'reorder', context: IN_F, from: 1, to: 0 });
  });

  test('the offset after the last item moves a folder item to the end of its folder', () => {
    expect(resolveMove(model, 3, 5, plain)).toEqual({ kind: 'reorder', context: IN_F, from: 0, to: 2 });
  });

  test('the last item dropped after itself stays a reorder', () => {
    expect(resolveMove(model, 4, 5, plain)).toEqual({ kind: 'reorder', context: IN_F, from: 1, to: 2 });
  });

  test('with drop zones the row after e reorders at the root', () => {
    expect(resolveMove(model, 6, 7, withZones)).toEqual({ kind: 'reorder', context: ROOT, from: 3, to: 4 });
  });
});

describe('resolveMove: transfers', () => {
  test('root item into an expanded folder at a position', () => {
    expect(resolveMove(model, 0, 3, plain)).toEqual({ kind: 'transfer', itemId: 'a', from: ROOT, to: IN_F, insertAt: 0 });
    expect(resolveMove(model, 0, 4, plain)).toEqual({ kind: 'transfer', itemId: 'a', from: ROOT, to: IN_F, insertAt: 1 });
  });

  test('folder item to the root', () => {
    expect(resolveMove(model, 3, 0, plain)).toEqual({ kind: 'transfer', itemId: 'c', from: IN_F, to: ROOT, insertAt: 0 });
    expect(resolveMove(model, 3, 6, plain)).toEqual({ kind: 'transfer', itemId: 'c', from: IN_F, to: ROOT, insertAt: 4 });
  });

  test('dropped on a folder row appends to that folder', () => {
    expect(resolveMove(model, 0, 2, { includeDropZones: false, dropPosition: 'on' })).toEqual({
      kind: 'transfer',
      itemId: 'a',
      from: ROOT,
      to: IN_F
    });
  });

  test('dropped on its own folder row leaves the folder, right below it', () => {
    expect(resolveMove(model, 3, 2, { includeDropZones: false, dropPosition: 'on' })).toEqual({
      kind: 'transfer',
      itemId: 'c',
      from: IN_F,
      to: ROOT,
      insertAt: 3
    });
  });

  test('a collapsed folder accepts items dropped onto it', () => {
    const collapsed = buildModel(['a', 'b', { folder: 'F', items: ['c', 'd'] }]);
    expect(resolveMove(collapsed, 1, 2, { includeDropZones: false, dropPosition: 'on' })).toEqual({
      kind: 'transfer',
      itemId: 'b',
      from: ROOT,
      to: IN_F
    });
  });

  test('between rows around a collapsed folder is a root reorder', () => {
    const collapsed = buildModel(['a', { folder: 'F', items: ['c'] }, 'e']);
    expect(resolveMove(collapsed, 0, 2, plain)).toEqual({ kind: 'reorder', context: ROOT, from: 0, to: 2 });
  });

  test('between two folders, an item moves across', () => {
    const twoFolders = buildModel([
      { folder: 'F', items: ['c', 'd'], expanded: true },
      { folder: 'G', items: ['x'], expanded: true }
    ]);
    // Display: F(0) c(1) d(2) G(3) x(4)
    expect(resolveMove(twoFolders, 1, 4, plain)).toEqual({
      kind: 'transfer',
      itemId: 'c',
      from: IN_F,
      to: { kind: 'folder', folderId: 'G' },
      insertAt: 0
    });
  });
});

describe('resolveMove: drop zones', () => {
  test('an item of another context dropped on a drop zone joins the folder', () => {
    expect(resolveMove(model, 0, 5, withZones)).toEqual({ kind: 'transfer', itemId: 'a', from: ROOT, to: IN_F });
  });

  test('an item dropped on its own folder drop zone leaves the folder', () => {
    expect(resolveMove(model, 3, 5, withZones)).toEqual({
      kind: 'transfer',
      itemId: 'c',
      from: IN_F,
      to: ROOT,
      insertAt: 3
    });
  });

  test('the same drag without drop zones is the end-of-folder reorder', () => {
    expect(resolveMove(model, 3, 5, plain).kind).toBe('reorder');
  });
});
