import { z } from 'zod';

export const fontStyleSchema = z.enum(['plain', 'bold', 'italic', 'bold-italic']);

export type FontStyle = z.infer<typeof fontStyleSchema>;

/** Point size; fractional sizes are allowed. */
export const fontSizeSchema = z.number().finite().positive();

export const isBold = (style: FontStyle): boolean =>
  style === 'bold' || style === 'bold-italic';

export const isItalic = (style: FontStyle): boolean =>
  style === 'italic' || style === 'bold-italic';

export const fontStyleOf = ({ bold = false, italic = false }: { bold?: boolean; italic?: boolean }): FontStyle => {
  if (bold && italic) return 'bold-italic';
  if (bold) return 'bold';
  if (italic) return 'italic';
  return 'plain';
};

/**
 * A parsed font file. Loaded once per reload and shared by every instance derived from it.
 */
export interface Typeface {
  readonly filePath: string;
  readonly familyName: string;
  readonly postscriptName?: string;
  readonly unitsPerEm: number;
  /** Advance width of the laid-out text, in font units. */
  advanceWidth(text: string): number;
}

export interface RegisteredFontInstance {
  source: 'registered';
  /** Logical name from the font configuration. */
  name: string;
  /** Family name stored in the font file itself. */
  family: string;
  style: FontStyle;
  size: number;
  typeface: Typeface;
}

export interface SystemFontInstance {
  source: 'system';
  name: string;
  family: string;
  style: FontStyle;
  size: number;
}

export type FontInstance = RegisteredFontInstance | SystemFontInstance;

/**
 * CSS font shorthand for an instance, usable as a canvas `ctx.font` value.
 *
 * @example
 * toCssFont({ source: 'system', name: 'Arial', family: 'Arial', style: 'bold', size: 12 });
 * // => 'bold 12pt "Arial"'
 */
export function toCssFont(instance: FontInstance): string {
  const parts: string[] = [];
  if (isItalic(instance.style)) parts.push('italic');
  if (isBold(instance.style)) parts.push('bold');
  parts.push(`${instance.size}pt`);
  parts.push(`"${instance.family.replace(/(["\\])/g, '\\$1')}"`);
  return parts.join(' ');
}

/**
 * Width of `text` in points. Only registered instances carry outline data,
 * so system instances yield null.
 */
export function measureText(instance: FontInstance, text: string): number | null {
  if (instance.source !== 'registered') return null;
  const { typeface } = instance;
  return (typeface.advanceWidth(text) / typeface.unitsPerEm) * instance.size;
}
