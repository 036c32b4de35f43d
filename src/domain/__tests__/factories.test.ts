import { SeedError } from '../errors';
import { createFolder, createItem, createModelFromSeed } from '../factories';
import { SAMPLE_FOLDERS, SAMPLE_ITEMS } from '../config/sampleCatalog';
import { describeByName, rootIds } from '../../test/builders/rowsBuilders';

describe('domain factories', () => {
  test('createItem trims the name and generates a prefixed id', () => {
    const item = createItem('  Row 9  ');
    expect(item.name).toBe('Row 9');
    expect(item.id).toMatch(/^item_/);
  });

  test('createFolder starts collapsed and empty', () => {
    const folder = createFolder('Folder Z', undefined, undefined, 'fz');
    expect(folder).toEqual({ id: 'fz', name: 'Folder Z', contents: [], isExpanded: false });
  });

  test('blank names are rejected', () => {
    expect(() => createItem('   ')).toThrow('Item.name must be a non-empty string');
    expect(() => createFolder('')).toThrow('Folder.name must be a non-empty string');
  });
});

describe('createModelFromSeed', () => {
  test('sample catalog layout', () => {
    const model = createModelFromSeed(SAMPLE_ITEMS, SAMPLE_FOLDERS);
    expect(describeByName(model)).toEqual([
      'Row 1',
      'Row 2',
      'Folder A[A.1,A.2,A.3]',
      'Row 3',
      'Row 4',
      'Folder B[B.1]',
      'Row 5'
    ]);
    expect(Object.values(model.folders).every((f) => !f.isExpanded)).toBe(true);
  });

  test('positions are applied in ascending order, clamped, unpositioned folders last', () => {
    const model = createModelFromSeed(
      [
        { id: 'a', name: 'A' },
        { id: 'b', name: 'B' }
      ],
      [
        { id: 'X', name: 'X', position: 99 },
        { id: 'Y', name: 'Y' },
        { id: 'Z', name: 'Z', position: 0 }
      ]
    );
    expect(rootIds(model)).toEqual(['Z', 'a', 'b', 'X', 'Y']);
  });

  test('seeded expanded state and ids are kept', () => {
    const model = createModelFromSeed([], [{ id: 'F', name: 'F', isExpanded: true, contents: [{ id: 'c', name: 'C' }] }]);
    expect(model.folders.F).toEqual({ id: 'F', name: 'F', contents: [{ id: 'c', name: 'C' }], isExpanded: true });
  });

  test('duplicate ids fail with SeedError', () => {
    const build = () =>
      createModelFromSeed([{ id: 'dup', name: 'A' }], [{ id: 'F', name: 'F', contents: [{ id: 'dup', name: 'B' }] }]);

    expect(build).toThrow(SeedError);
    expect(build).toThrow('Duplicate id in seed data: dup');
  });

  test('duplicate ids are reported on the error', () => {
    let caught: unknown;
    try {
      createModelFromSeed([{ id: 'dup', name: 'A' }, { id: 'dup', name: 'B' }], []);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SeedError);
    if (!(caught instanceof SeedError)) return;
    expect(caught.name).toBe('SeedError');
    expect(caught.problem).toEqual({ kind: 'duplicateId', id: 'dup' });
  });

  test('blank seed names fail with SeedError', () => {
    expect(() => createModelFromSeed([{ id: 'r1', name: '   ' }], [])).toThrow(
      new SeedError({ kind: 'blankName', entry: 'item', id: 'r1' })
    );
    expect(() => createModelFromSeed([], [{ name: '' }])).toThrow('Blank folder name in seed data');
    expect(() => createModelFromSeed([], [{ id: 'F', name: 'F', contents: [{ name: ' ' }] }])).toThrow(SeedError);
  });

  test('a folder id may not reuse an item id', () => {
    expect(() => createModelFromSeed([{ id: 'x', name: 'A' }], [{ id: 'x', name: 'F' }])).toThrow(SeedError);
  });
});
