/**
 * Registry of custom typefaces named in a font configuration file.
 *
 * Lookups check the registered typefaces first and fall back to the font families
 * installed on the host. The registry is built once by the owning application via
 * `FontRegistry.create` (which performs the first load) and rebuilt wholesale by
 * `reloadFonts`.
 */

import { resolve } from 'path';
import { Mutex } from 'async-mutex';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../logger.js';
import { loadConfig, type FontRegistryConfig } from '../config.js';
import { InvalidFontRequestError } from '../errors.js';
import { readFontConfig, type FontConfigEntry } from '../infra/font-config-file.js';
import { loadTypeface as fontkitLoader, type TypefaceLoader } from '../infra/typeface-loader.js';
import { fontListProvider, type SystemFontProvider } from '../infra/system-fonts.js';
import {
  fontSizeSchema,
  fontStyleSchema,
  type FontInstance,
  type FontStyle,
  type Typeface,
} from '../types/font.js';

export interface FontRegistryOptions {
  configPath: string;
  /** Directory relative font paths resolve against. Defaults to the working directory. */
  baseDir?: string;
  loadTypeface?: TypefaceLoader;
  systemFonts?: SystemFontProvider;
  logger?: Logger;
}

export class FontRegistry {
  private fonts = new Map<string, Typeface>();
  private readonly mutex = new Mutex();
  private readonly configPath: string;
  private readonly baseDir: string;
  private readonly loadTypeface: TypefaceLoader;
  private readonly systemFonts: SystemFontProvider;
  private readonly log: Logger;

  private constructor(options: FontRegistryOptions) {
    this.configPath = options.configPath;
    this.baseDir = options.baseDir ?? process.cwd();
    this.loadTypeface = options.loadTypeface ?? fontkitLoader;
    this.systemFonts = options.systemFonts ?? fontListProvider;
    this.log = (options.logger ?? rootLogger).child({ module: 'font-registry' });
  }

  /**
   * Build a registry and load the configured fonts. The returned registry is always ready;
   * configuration and font file failures are logged and leave it with fewer (or no) fonts.
   */
  static async create(options: FontRegistryOptions): Promise<FontRegistry> {
    const registry = new FontRegistry(options);
    await registry.reloadFonts();
    return registry;
  }

  /** Logical names of the loaded typefaces, in configuration order. */
  async listRegisteredNames(): Promise<string[]> {
    return this.mutex.runExclusive(() => [...this.fonts.keys()]);
  }

  /** Font families currently installed on the host. Not cached. */
  async listSystemFontFamilyNames(): Promise<string[]> {
    return this.systemFonts.listFamilies();
  }

  /**
   * Create a font instance by logical name, falling back to an installed family of the exact
   * same name. Registered typefaces take priority over system families.
   *
   * @returns The instance, or null when neither source knows the name.
   * @throws InvalidFontRequestError when style or size is invalid.
   */
  async createFont(name: string, style: FontStyle, size: number): Promise<FontInstance | null> {
    validateRequest(style, size);

    const registered = await this.mutex.runExclusive((): FontInstance | null => {
      const typeface = this.fonts.get(name);
      if (!typeface) return null;
      return { source: 'registered', name, family: typeface.familyName, style, size, typeface };
    });
    if (registered) return registered;

    const families = await this.systemFonts.listFamilies();
    if (families.includes(name)) {
      return { source: 'system', name, family: name, style, size };
    }
    return null;
  }

  /**
   * Re-read the font configuration and every font file it names, then replace the
   * registered set in one step. Calls made while a reload runs wait for it to finish.
   */
  async reloadFonts(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.fonts = await this.loadFonts();
    });
  }

  private async loadFonts(): Promise<Map<string, Typeface>> {
    let entries: FontConfigEntry[] = [];
    try {
      entries = await readFontConfig(this.configPath);
    } catch (err) {
      this.log.warn({ err, configPath: this.configPath }, 'Failed to load font configuration');
    }

    const results = await Promise.all(
      entries.map(async (entry) => {
        try {
          return await this.loadTypeface(resolve(this.baseDir, entry.path));
        } catch (err) {
          this.log.warn({ err, font: entry.name, path: entry.path }, `Failed to load font "${entry.name}"`);
          return null;
        }
      }),
    );

    const fonts = new Map<string, Typeface>();
    entries.forEach((entry, i) => {
      const typeface = results[i];
      if (typeface) fonts.set(entry.name, typeface);
    });

    this.log.info(
      { configPath: this.configPath, loaded: fonts.size, failed: entries.length - fonts.size },
      'Loaded fonts',
    );
    return fonts;
  }
}

function validateRequest(style: FontStyle, size: number): void {
  const issues: string[] = [];
  const styleResult = fontStyleSchema.safeParse(style);
  if (!styleResult.success) issues.push(`style: ${styleResult.error.issues[0]?.message ?? 'invalid'}`);
  const sizeResult = fontSizeSchema.safeParse(size);
  if (!sizeResult.success) issues.push(`size: ${sizeResult.error.issues[0]?.message ?? 'invalid'}`);
  if (issues.length > 0) {
    throw new InvalidFontRequestError(`Invalid font request: ${issues.join('; ')}`, issues);
  }
}

/**
 * Build a registry from the environment configuration (`FONT_CONFIG_PATH`, `FONT_BASE_DIR`).
 */
export async function createFontRegistry(
  config: FontRegistryConfig = loadConfig(),
  overrides: Omit<FontRegistryOptions, 'configPath' | 'baseDir'> = {},
): Promise<FontRegistry> {
  return FontRegistry.create({
    configPath: config.fontConfigPath,
    baseDir: config.fontBaseDir,
    ...overrides,
  });
}
