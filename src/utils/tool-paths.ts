import fs from 'fs-extra';
import path from 'path';
import { CONFIG_FILE_NAME, CONFIG_PATH_ENV } from '../constants';

/**
 * Directory the tool is installed in: the nearest ancestor holding package.json
 */
export function toolDirectory(start: string = __dirname): string {
  let current = path.resolve(start);

  for (;;) {
    if (fs.pathExistsSync(path.join(current, 'package.json'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return path.resolve(start);
    }
    current = parent;
  }
}

/**
 * Config file location: explicit option, then GDRUN_CONFIG, then beside the tool
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  const configured = explicit ?? env[CONFIG_PATH_ENV];
  if (configured) {
    return path.resolve(configured);
  }
  return path.join(toolDirectory(), CONFIG_FILE_NAME);
}
