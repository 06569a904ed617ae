import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  parseProfileText, formatProfileSource, readProfileSource, convertProfileFile,
} from '../src/index.js';

describe('parseProfileText', () => {
  it('reads space- and comma-separated pairs', () => {
    expect(parseProfileText('1.0 0.0\n0.5, 0.06\n0\t0\n')).toEqual([[1, 0], [0.5, 0.06], [0, 0]]);
  });

  it('skips blank, comment, placeholder and short lines', () => {
    const text = [
      '# demo airfoil',
      '',
      '1.0 0.0',
      '...',
      '0.5 0.05 ...',
      'lonely',
      '0.25 0.04 trailing-field',
      '   ',
    ].join('\r\n');
    expect(parseProfileText(text)).toEqual([[1, 0], [0.25, 0.04]]);
  });

  it('names the offending line', () => {
    expect(() => parseProfileText('1.0 0.0\nfoo bar\n')).toThrow('Line 2: expected two numbers, got "foo bar"');
  });

  it('returns nothing for an empty listing', () => {
    expect(parseProfileText('')).toEqual([]);
  });
});

describe('formatProfileSource', () => {
  it('rounds to six decimals and ends with a newline', () => {
    const out = formatProfileSource('demo', [[0.1234567, 0.25], [1, 0.5]]);
    expect(out.endsWith('}\n')).toBe(true);
    expect(JSON.parse(out)).toEqual({ name: 'demo', points: [[0.123457, 0.25], [1, 0.5]] });
  });

  it('records the source when given', () => {
    const out = formatProfileSource('demo', [[0, 0]], 'demo.txt');
    expect(JSON.parse(out)).toEqual({ name: 'demo', source: 'demo.txt', points: [[0, 0]] });
  });
});

describe('profile source files', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wing-profiles-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a valid file', () => {
    const file = path.join(dir, 'good.json');
    fs.writeFileSync(file, JSON.stringify({ name: 'good', points: [[0, 0], [1, 0]] }));
    expect(readProfileSource(file)).toEqual({ name: 'good', points: [[0, 0], [1, 0]] });
  });

  it('rejects invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "name": ');
    expect(() => readProfileSource(file)).toThrow(`Profile source "${file}" is not valid JSON`);
  });

  it('rejects a malformed document', () => {
    const file = path.join(dir, 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ name: 'bad', points: [[0, 'x']] }));
    expect(() => readProfileSource(file)).toThrow(`Profile source "${file}" is malformed: points.0.1: Expected number, received string`);
  });

  it('converts a text listing into a source file', () => {
    const input = path.join(dir, 'demo.txt');
    const output = path.join(dir, 'demo.json');
    fs.writeFileSync(input, '# demo\n1 0\n0.5 0.1\n0 0\n0.5 -0.1\n');

    const points = convertProfileFile(input, 'demo', output);
    expect(points).toHaveLength(4);
    expect(readProfileSource(output)).toEqual({
      name: 'demo',
      source: input,
      points: [[1, 0], [0.5, 0.1], [0, 0], [0.5, -0.1]],
    });
  });
});
