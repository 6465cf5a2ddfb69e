import { describe, it, expect } from 'vitest';
import { deflateRawSync } from 'zlib';
import { countFiles, decodeManifest, encodeManifest } from './manifest.js';

describe('manifest', () => {
  it('stores hash=path lines, deflated', () => {
    const paths = new Map([
      ['/css/', '1'],
      ['/css/site.css', 'd41d8cd98f00b204e9800998ecf8427e'],
    ]);

    const decoded = decodeManifest(deflateRawSync(Buffer.from('1=/css/\nd41d8cd98f00b204e9800998ecf8427e=/css/site.css\n')));

    expect(decoded).toEqual(paths);
    expect(decodeManifest(encodeManifest(paths))).toEqual(paths);
  });

  it('skips malformed lines', () => {
    expect(decodeManifest(deflateRawSync(Buffer.from('garbage\n=/nohash\nabc=/ok.txt\n')))).toEqual(
      new Map([['/ok.txt', 'abc']])
    );
  });

  it('counts files, not directories', () => {
    expect(countFiles(new Map([['/a/', '1'], ['/a/b.txt', 'x'], ['/c.txt', 'y']]))).toBe(2);
  });
});
