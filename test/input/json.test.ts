// test/input/json.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodeJson } from '../../src/input/json.js';
import { FloatValue } from '../../src/schema/classify.js';

describe('decodeJson', () => {
  it('decodes objects to Maps in document order', () => {
    const data = decodeJson('{"name": "x", "2024": 1, "id": 3}');
    assert.ok(data instanceof Map);
    assert.deepEqual([...data.keys()], ['name', '2024', 'id']);
    assert.equal(data.get('2024'), 1);
  });

  it('keeps the first position of a repeated key and the last value', () => {
    const data = decodeJson('{"a": 1, "b": 2, "a": 3}');
    assert.deepEqual(data, new Map([['a', 3], ['b', 2]]));
  });

  it('decodes nested arrays and objects', () => {
    const data = decodeJson(' [ {"7": [true, false, null]}, [], {} ] ');
    assert.deepEqual(data, [new Map([['7', [true, false, null]]]), [], new Map()]);
  });

  it('decodes scalars at the top level', () => {
    assert.equal(decodeJson('"hi"'), 'hi');
    assert.equal(decodeJson('-12'), -12);
    assert.equal(decodeJson('0.25'), 0.25);
    assert.equal(decodeJson('null'), null);
  });

  it('marks integral numbers written with a fraction or exponent', () => {
    for (const text of ['10.0', '1e3', '-2E+1']) {
      const value = decodeJson(text);
      assert.ok(value instanceof FloatValue, text);
    }
    const value = decodeJson('10.0');
    assert.ok(value instanceof FloatValue);
    assert.equal(value.value, 10);
    assert.equal(JSON.stringify({ v: value }), '{"v":10}');
  });

  it('decodes escapes', () => {
    assert.equal(decodeJson('"a\\"b\\\\c\\/d\\n\\t"'), 'a"b\\c/d\n\t');
    assert.equal(decodeJson('"caf\\u00e9 \\ud83d\\ude00"'), 'café \u{1F600}');
  });

  it('rejects malformed input with a SyntaxError', () => {
    const cases: Array<[string, string]> = [
      ['', 'Unexpected end of JSON input'],
      ['{"x": ', 'Unexpected end of JSON input'],
      ['[1, 2,]', "Unexpected token ']' at position 6"],
      ['{"a" 1}', "Unexpected token '1' at position 5"],
      ['{a: 1}', "Unexpected token 'a' at position 1"],
      ['01', "Unexpected token '1' at position 1"],
      ['tru', "Unexpected token 't' at position 0"],
      ['[1] x', "Unexpected token 'x' at position 4"],
      ['"abc', 'Unterminated string in JSON'],
      ['"\\x"', 'Bad escaped character at position 1'],
      ['"\\u12"', 'Bad Unicode escape at position 1'],
      ['"a\nb"', 'Bad control character in string literal at position 2'],
    ];
    for (const [text, message] of cases) {
      assert.throws(() => decodeJson(text), { name: 'SyntaxError', message }, JSON.stringify(text));
    }
  });
});
