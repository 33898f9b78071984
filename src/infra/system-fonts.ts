import { getFonts } from 'font-list';

/** Font families installed on the host. */
export interface SystemFontProvider {
  listFamilies(): Promise<string[]>;
}

/**
 * Queries the operating system on every call; installed fonts can change while the process runs.
 */
export const fontListProvider: SystemFontProvider = {
  listFamilies: () => getFonts({ disableQuoting: true }),
};
