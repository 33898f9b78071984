/**
 * Print the registered and installed font names as JSON.
 *
 * Usage: npm run fonts:list [-- --registered-only]
 */

import { createFontRegistry } from '../src/services/font-registry.js';
import { logger } from '../src/logger.js';

async function main() {
  const registeredOnly = process.argv.includes('--registered-only');
  const registry = await createFontRegistry();

  const registered = await registry.listRegisteredNames();
  const system = registeredOnly ? [] : await registry.listSystemFontFamilyNames();

  process.stdout.write(`${JSON.stringify({ registered, system }, null, 2)}\n`);
}

main().catch((err) => {
  logger.error({ err }, 'Failed to list fonts');
  process.exitCode = 1;
});
