/**
 * Readers that turn puzzle input into data structures.
 *
 * Every function takes a `source`: the path of an existing file, whose
 * contents are read, or otherwise the input text itself.
 */

import * as fs from 'fs';

import { InputParseError } from '../domain/errors.js';
import { RECORD_SEPARATOR } from '../domain/constants.js';
import { Vec2D } from '../measure/vec2d.js';

/**
 * Input text for a file path or literal text, with `\r\n` normalised to `\n`
 */
export function contents(source: string): string {
  const text = isFile(source) ? fs.readFileSync(source, 'utf-8') : source;
  return text.replace(/\r\n/g, '\n');
}

function isFile(source: string): boolean {
  // Multi-line input can never be a path
  if (source.length === 0 || source.includes('\n')) return false;
  return fs.existsSync(source) && fs.statSync(source).isFile();
}

function trimNewlines(text: string): string {
  return text.replace(/^\n+|\n+$/g, '');
}

function nonEmptyLines(text: string): string[] {
  return text.split('\n').filter(line => line.length > 0);
}

function records(text: string): string[] {
  return text
    .split(RECORD_SEPARATOR)
    .map(trimNewlines)
    .filter(record => record.trim().length > 0);
}

/**
 * Parse one numeric token, rejecting blanks, garbage and infinities
 */
export function parseNumber(token: string): number {
  const trimmed = token.trim();
  const value = Number(trimmed);
  if (trimmed.length === 0 || !Number.isFinite(value)) {
    throw new InputParseError('Could not parse number', token);
  }
  return value;
}

/** Non-empty lines */
export function readLines(source: string): string[] {
  return nonEmptyLines(contents(source));
}

/** One number per non-empty line */
export function readNumbers(source: string): number[] {
  return readLines(source).map(parseNumber);
}

/**
 * Each non-empty line split on `sep` and parsed.
 * A blank separator splits on runs of whitespace.
 */
export function readNumberLists(source: string, sep: string): number[][] {
  return readLines(source).map(line => {
    const tokens = sep.trim().length === 0 ? line.trim().split(/\s+/) : line.split(sep);
    return tokens.map(parseNumber);
  });
}

/**
 * Blank-line separated groups of one number per line:
 * ```
 * 1000
 * 2000
 *
 * 3000
 * ```
 */
export function readNumberRecords(source: string): number[][] {
  return records(contents(source)).map(record => nonEmptyLines(record).map(parseNumber));
}

/** Blank-line separated records, without their surrounding newlines */
export function readStringRecords(source: string): string[] {
  return records(contents(source));
}

/** Every character of the input except newlines */
export function readChars(source: string): string[] {
  return Array.from(contents(source)).filter(char => char !== '\n');
}

/** Single-line input split on a separator */
export function readLineSep(source: string, sep: string): string[] {
  return contents(source).trim().split(sep);
}

/** Single-line, comma separated numbers */
export function readLineRecord(source: string): number[] {
  return readLineSep(source, ',').map(parseNumber);
}

/** Grid of characters, one row per line */
export function readGrid(source: string): string[][] {
  return trimNewlines(contents(source))
    .split('\n')
    .map(line => Array.from(line));
}

/** Grid of single digits */
export function readGridNumbers(source: string): number[][] {
  return readLines(source).map(line =>
    Array.from(line).map(char => {
      if (char < '0' || char > '9') {
        throw new InputParseError('Expected a digit', char);
      }
      return Number(char);
    })
  );
}

/**
 * Every grid cell paired with its position (x = column, y = row)
 */
export function readGridToMap(source: string): Array<[Vec2D, string]> {
  return readGrid(source).flatMap((row, y) =>
    row.map((char, x): [Vec2D, string] => [new Vec2D(x, y), char])
  );
}

/**
 * Blank-line separated character grids:
 * ```
 * ..##.
 * .#...
 *
 * ..#..
 * ....#
 * ```
 */
export function readGridRecords(source: string): string[][][] {
  return records(contents(source)).map(record =>
    nonEmptyLines(record).map(line => Array.from(line))
  );
}
