// test/schema/classify.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  FloatValue,
  classify,
  distinctSorted,
  formatTypeList,
  frozenset,
  mappingEntries,
  sample,
  tuple,
  typeNameOf,
} from '../../src/schema/classify.js';

class Point {
  constructor(readonly x: number, readonly y: number) {}
}

describe('typeNameOf', () => {
  it('names scalars', () => {
    assert.equal(typeNameOf(1), 'int');
    assert.equal(typeNameOf(-0), 'int');
    assert.equal(typeNameOf(10n), 'int');
    assert.equal(typeNameOf(3.14), 'float');
    assert.equal(typeNameOf(NaN), 'float');
    assert.equal(typeNameOf(Infinity), 'float');
    assert.equal(typeNameOf('hello'), 'str');
    assert.equal(typeNameOf(true), 'bool');
    assert.equal(typeNameOf(null), 'NoneType');
    assert.equal(typeNameOf(undefined), 'NoneType');
  });

  it('names a number written as a fraction as float even when integral', () => {
    assert.equal(typeNameOf(new FloatValue(10)), 'float');
    assert.deepEqual(classify(new FloatValue(-0)), { kind: 'scalar', typeName: 'float' });
  });

  it('names containers', () => {
    assert.equal(typeNameOf({}), 'dict');
    assert.equal(typeNameOf(Object.create(null)), 'dict');
    assert.equal(typeNameOf(new Map()), 'dict');
    assert.equal(typeNameOf([]), 'list');
    assert.equal(typeNameOf(tuple(1, 2)), 'tuple');
    assert.equal(typeNameOf(new Set([1])), 'set');
    assert.equal(typeNameOf(frozenset(['a'])), 'frozenset');
  });

  it('falls back to the constructor name for other objects', () => {
    assert.equal(typeNameOf(new Date(0)), 'Date');
    assert.equal(typeNameOf(/x/), 'RegExp');
    assert.equal(typeNameOf(new Point(1, 2)), 'Point');
    assert.equal(typeNameOf(() => 1), 'function');
    assert.equal(typeNameOf(Symbol('s')), 'symbol');
  });
});

describe('classify', () => {
  it('tags mappings with their entries', () => {
    const result = classify({ b: 1, a: 2 });
    assert.equal(result.kind, 'mapping');
    assert.equal(result.typeName, 'dict');
    if (result.kind === 'mapping') {
      assert.deepEqual(result.entries, [['b', 1], ['a', 2]]);
    }
  });

  it('tags ordered and unordered sequences', () => {
    assert.equal(classify([1]).kind, 'ordered-sequence');
    assert.equal(classify(tuple(1)).typeName, 'tuple');
    assert.equal(classify(new Set()).kind, 'unordered-sequence');
    assert.equal(classify(frozenset()).typeName, 'frozenset');
  });

  it('tags everything else as scalar', () => {
    assert.deepEqual(classify('x'), { kind: 'scalar', typeName: 'str' });
    assert.deepEqual(classify(new Date(0)), { kind: 'scalar', typeName: 'Date' });
  });
});

describe('mappingEntries', () => {
  it('stringifies Map keys and keeps insertion order', () => {
    const map = new Map<unknown, unknown>([[2, 'two'], ['one', 1]]);
    assert.deepEqual(mappingEntries(map), [['2', 'two'], ['one', 1]]);
  });

  it('returns nothing for non-mappings', () => {
    assert.deepEqual(mappingEntries([1, 2]), []);
  });
});

describe('sample', () => {
  it('takes the first elements in iteration order', () => {
    assert.deepEqual(sample([5, 6, 7, 8], 2), [5, 6]);
    assert.deepEqual(sample(new Set(['a', 'b', 'c']), 10), ['a', 'b', 'c']);
  });

  it('takes nothing when the limit is zero or negative', () => {
    assert.deepEqual(sample([1, 2], 0), []);
    assert.deepEqual(sample([1, 2], -3), []);
  });

  it('stops pulling from the iterator once the limit is reached', () => {
    let pulled = 0;
    function* counting() {
      for (;;) {
        pulled++;
        yield pulled;
      }
    }
    assert.deepEqual(sample(counting(), 3), [1, 2, 3]);
    assert.equal(pulled, 3);
  });
});

describe('formatTypeList', () => {
  it('uses single quotes and comma-space separators', () => {
    assert.equal(formatTypeList(['NoneType', 'int']), "['NoneType', 'int']");
    assert.equal(formatTypeList(['str']), "['str']");
  });

  it('switches to double quotes for names with a single quote', () => {
    assert.equal(formatTypeList(["it's"]), `["it's"]`);
    assert.equal(formatTypeList([`a'b"c`]), `['a\\'b"c']`);
  });
});

describe('distinctSorted', () => {
  it('deduplicates and sorts', () => {
    assert.deepEqual(distinctSorted(['str', 'int', 'str', 'NoneType']), ['NoneType', 'int', 'str']);
  });
});
