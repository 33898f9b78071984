import { config as loadEnv } from 'dotenv';

loadEnv();

export const DEFAULT_FONT_CONFIG_PATH = 'config/fonts.properties';

export interface FontRegistryConfig {
  /** Font configuration file; relative paths resolve against the working directory. */
  fontConfigPath: string;
  /** Directory that relative font file paths in the configuration resolve against. */
  fontBaseDir: string;
}

export const loadConfig = (): FontRegistryConfig => {
  const { FONT_CONFIG_PATH, FONT_BASE_DIR } = process.env;

  return {
    fontConfigPath: FONT_CONFIG_PATH || DEFAULT_FONT_CONFIG_PATH,
    fontBaseDir: FONT_BASE_DIR || process.cwd(),
  };
};
