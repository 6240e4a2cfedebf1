import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { decodeText, readTextFile } from '../../src/core/source.js';
import { detect } from '../../src/core/detector.js';

describe('decodeText', () => {
  it('should decode valid UTF-8 strictly', () => {
    expect(decodeText(Buffer.from('héllo wörld', 'utf-8'))).toEqual({ text: 'héllo wörld', lossy: false });
  });

  it('should replace undecodable bytes and mark the text as lossy', () => {
    expect(decodeText(new Uint8Array([0x61, 0xff, 0x62]))).toEqual({ text: 'a�b', lossy: true });
  });

  it('should keep a leading byte order mark', () => {
    const strict = decodeText(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]));
    const lossy = decodeText(new Uint8Array([0xef, 0xbb, 0xbf, 0x61, 0xff]));

    expect(strict).toEqual({ text: '\ufeffa', lossy: false });
    expect(lossy).toEqual({ text: '\ufeffa\ufffd', lossy: true });

    const stats = detect(strict.text).statistics;
    expect(stats.totalChars).toBe(2);
    expect(stats.highBytes).toBe(1);
  });
});

describe('readTextFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mojiscan-source-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read UTF-8 files as-is', () => {
    const path = join(dir, 'ok.txt');
    writeFileSync(path, 'itâ€™s fine to read', 'utf-8');

    expect(readTextFile(path)).toEqual({ text: 'itâ€™s fine to read', lossy: false });
  });

  it('should let the replacement-character rule see Latin-1 files', () => {
    const path = join(dir, 'latin1.txt');
    // "café" saved as Latin-1
    writeFileSync(path, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

    const { text, lossy } = readTextFile(path);
    const result = detect(text);

    expect(lossy).toBe(true);
    expect(text).toBe('caf�');
    expect(result.hasMojibake).toBe(true);
    expect(result.issues.map(i => i.description)).toEqual(['Replacement characters (data loss)']);
  });

  it('should throw for a missing file', () => {
    expect(() => readTextFile(join(dir, 'missing.txt'))).toThrow(/ENOENT/);
  });
});
