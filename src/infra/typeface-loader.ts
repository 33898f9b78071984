import { readFile } from 'fs/promises';
import * as fontkit from 'fontkit';
import { FontFileInvalidError } from '../errors.js';
import type { Typeface } from '../types/font.js';

/** Parses a single font file into a typeface. Rejects with FontFileInvalidError. */
export type TypefaceLoader = (filePath: string) => Promise<Typeface>;

const SFNT_SIGNATURES = new Set(['00010000', '74727565', '4f54544f', '74746366']); // 1.0, 'true', 'OTTO', 'ttcf'

const reasonOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const loadTypeface: TypefaceLoader = async (filePath) => {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (err) {
    throw new FontFileInvalidError(filePath, reasonOf(err), err);
  }

  // fontkit also reads WOFF, WOFF2 and DFont; only sfnt outline fonts are accepted here.
  if (buffer.length < 4 || !SFNT_SIGNATURES.has(buffer.subarray(0, 4).toString('hex'))) {
    throw new FontFileInvalidError(filePath, 'not a TrueType or OpenType font');
  }

  try {
    const parsed = fontkit.create(buffer);
    const font = 'fonts' in parsed ? parsed.fonts[0] : parsed;
    if (!font) {
      throw new Error('font collection is empty');
    }

    // fontkit decodes tables lazily; touch head and name now so corrupt files fail during load.
    const unitsPerEm = font.unitsPerEm;
    const familyName = font.familyName ?? font.postscriptName ?? '';
    if (!unitsPerEm || !familyName) {
      throw new Error('missing head or name table data');
    }

    return {
      filePath,
      familyName,
      postscriptName: font.postscriptName ?? undefined,
      unitsPerEm,
      advanceWidth: (text) => font.layout(text).advanceWidth,
    };
  } catch (err) {
    throw new FontFileInvalidError(filePath, reasonOf(err), err);
  }
};
