/**
 * Tests for input readers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { fileURLToPath } from 'node:url';
import {
  contents,
  parseNumber,
  readChars,
  readGrid,
  readGridNumbers,
  readGridRecords,
  readGridToMap,
  readLineRecord,
  readLineSep,
  readLines,
  readNumberLists,
  readNumberRecords,
  readNumbers,
  readStringRecords,
} from '../../src/io/reader.js';
import { InputParseError } from '../../src/domain/errors.js';
import { Vec2D } from '../../src/measure/vec2d.js';

const mazePath = fileURLToPath(new URL('../fixtures/maze.txt', import.meta.url));

describe('contents', () => {
  it('should read an existing file', () => {
    assert.strictEqual(contents(mazePath), 'S..#....\n.#.#.##.\n.#...#E.\n');
  });

  it('should treat anything else as literal text', () => {
    assert.strictEqual(contents('not/a/real/file.txt'), 'not/a/real/file.txt');
    assert.strictEqual(contents(''), '');
  });

  it('should normalise Windows line endings', () => {
    assert.strictEqual(contents('a\r\nb\r\n'), 'a\nb\n');
  });
});

describe('parseNumber', () => {
  it('should parse integers and decimals', () => {
    assert.strictEqual(parseNumber(' 42 '), 42);
    assert.strictEqual(parseNumber('-3.5'), -3.5);
  });

  it('should reject blanks and garbage', () => {
    assert.throws(() => parseNumber(''), InputParseError);
    assert.throws(() => parseNumber('12a'), /Could not parse number: "12a"/);
  });

  it('should reject infinities', () => {
    assert.throws(() => parseNumber('Infinity'), /Could not parse number: "Infinity"/);
    assert.throws(() => parseNumber('-Infinity'), InputParseError);
    assert.throws(() => readNumbers('1\nInfinity\n'), InputParseError);
  });
});

describe('line readers', () => {
  it('should drop empty lines', () => {
    assert.deepStrictEqual(readLines('one\n\ntwo\n'), ['one', 'two']);
  });

  it('should read one number per line', () => {
    assert.deepStrictEqual(readNumbers('1\n-2\n30\n'), [1, -2, 30]);
  });

  it('should split number lists on a separator', () => {
    assert.deepStrictEqual(readNumberLists('1,2,3\n4,5\n', ','), [[1, 2, 3], [4, 5]]);
  });

  it('should split number lists on whitespace for a blank separator', () => {
    assert.deepStrictEqual(readNumberLists('  1   2\t3\n4 5\n', ' '), [[1, 2, 3], [4, 5]]);
  });

  it('should read a single separated line', () => {
    assert.deepStrictEqual(readLineSep('a-b-c\n', '-'), ['a', 'b', 'c']);
    assert.deepStrictEqual(readLineRecord('3,1,4,1,5\n'), [3, 1, 4, 1, 5]);
  });

  it('should read every character except newlines', () => {
    assert.deepStrictEqual(readChars('ab\nc\n'), ['a', 'b', 'c']);
  });
});

describe('record readers', () => {
  const grouped = '1000\n2000\n\n3000\n\n\n4000\n5000\n';

  it('should group numbers by blank lines', () => {
    assert.deepStrictEqual(readNumberRecords(grouped), [[1000, 2000], [3000], [4000, 5000]]);
  });

  it('should group text by blank lines', () => {
    assert.deepStrictEqual(readStringRecords('ab\ncd\n\nef\n'), ['ab\ncd', 'ef']);
  });

  it('should group grids by blank lines', () => {
    assert.deepStrictEqual(readGridRecords('#.\n.#\n\n..\n'), [
      [['#', '.'], ['.', '#']],
      [['.', '.']],
    ]);
  });
});

describe('grid readers', () => {
  it('should split a grid into characters', () => {
    assert.deepStrictEqual(readGrid('\nab\ncd\n'), [['a', 'b'], ['c', 'd']]);
  });

  it('should keep leading spaces in grid rows', () => {
    assert.deepStrictEqual(readGrid('  #\n#  \n'), [[' ', ' ', '#'], ['#', ' ', ' ']]);
  });

  it('should read the fixture maze', () => {
    const grid = readGrid(mazePath);

    assert.strictEqual(grid.length, 3);
    assert.strictEqual(grid[0].join(''), 'S..#....');
    assert.strictEqual(grid[2][6], 'E');
  });

  it('should parse digit grids', () => {
    assert.deepStrictEqual(readGridNumbers('123\n456\n'), [[1, 2, 3], [4, 5, 6]]);
  });

  it('should reject non-digits in digit grids', () => {
    assert.throws(() => readGridNumbers('12\n3x\n'), /Expected a digit: "x"/);
  });

  it('should pair each cell with its column and row', () => {
    assert.deepStrictEqual(readGridToMap('ab\nc'), [
      [new Vec2D(0, 0), 'a'],
      [new Vec2D(1, 0), 'b'],
      [new Vec2D(0, 1), 'c'],
    ]);
  });
});
