import { readFile } from 'fs/promises';
import { parseLines } from 'dot-properties';
import { FontConfigUnreadableError } from '../errors.js';

export interface FontConfigEntry {
  /** Logical name the typeface is registered under. */
  name: string;
  /** Font file path exactly as written in the configuration. */
  path: string;
}

/**
 * Read a `.properties` font configuration: one `logical_name = font_path` pair per entry.
 *
 * Entries come back in file order. A key repeated later in the file keeps its first position
 * and takes the later value.
 */
export async function readFontConfig(configPath: string): Promise<FontConfigEntry[]> {
  let source: string;
  try {
    source = await readFile(configPath, 'utf8');
  } catch (err) {
    throw new FontConfigUnreadableError(configPath, err);
  }

  // Comment lines come back as strings, key/value pairs as [key, value].
  const paths = new Map<string, string>();
  try {
    for (const line of parseLines(source)) {
      if (!Array.isArray(line)) continue;
      const [name, value] = line;
      if (typeof name === 'string' && typeof value === 'string') {
        paths.set(name, value);
      }
    }
  } catch (err) {
    throw new FontConfigUnreadableError(configPath, err);
  }
  return [...paths].map(([name, path]) => ({ name, path }));
}
