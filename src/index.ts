export { FontRegistry, createFontRegistry } from './services/font-registry.js';
export type { FontRegistryOptions } from './services/font-registry.js';
export { loadConfig, DEFAULT_FONT_CONFIG_PATH } from './config.js';
export type { FontRegistryConfig } from './config.js';
export { FontConfigUnreadableError, FontFileInvalidError, InvalidFontRequestError } from './errors.js';
export { readFontConfig } from './infra/font-config-file.js';
export type { FontConfigEntry } from './infra/font-config-file.js';
export { loadTypeface } from './infra/typeface-loader.js';
export type { TypefaceLoader } from './infra/typeface-loader.js';
export { fontListProvider } from './infra/system-fonts.js';
export type { SystemFontProvider } from './infra/system-fonts.js';
export { fontStyleOf, isBold, isItalic, measureText, toCssFont } from './types/font.js';
export type {
  FontInstance,
  FontStyle,
  RegisteredFontInstance,
  SystemFontInstance,
  Typeface,
} from './types/font.js';
