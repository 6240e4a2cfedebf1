import { readFileSync } from 'node:fs';
import type { SourceText } from './types.js';

const STDIN_FD = 0;

/**
 * Strict UTF-8 first; undecodable bytes fall back to U+FFFD so the
 * replacement-character rule can report the loss. A leading BOM is kept
 * and counted like any other character.
 */
export function decodeText(bytes: Uint8Array): SourceText {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes), lossy: false };
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return { text: new TextDecoder('utf-8', { ignoreBOM: true }).decode(bytes), lossy: true };
  }
}

/** `-` reads standard input. */
export function readTextFile(filePath: string): SourceText {
  const bytes = filePath === '-' ? readFileSync(STDIN_FD) : readFileSync(filePath);
  return decodeText(bytes);
}
