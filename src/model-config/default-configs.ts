/**
 * Built-in model descriptors shipped in the package's `model_config/` directory
 */

import { readdir } from 'fs/promises';
import path from 'path';

/**
 * Path of the built-in descriptor directory
 */
export function getDefaultConfigDir(): string {
  return path.resolve(__dirname, '..', '..', 'model_config');
}

/**
 * Absolute paths of the built-in descriptor files
 */
export async function getDefaultConfigs(): Promise<string[]> {
  const configDir = getDefaultConfigDir();
  const entries = await readdir(configDir);
  return entries
    .filter(entry => entry.endsWith('.yaml'))
    .sort()
    .map(entry => path.join(configDir, entry));
}
