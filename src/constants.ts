export const TOOL_NAME = 'Gdrun';

export const CONFIG_FILE_NAME = `${TOOL_NAME}.json`;

/** Folder the tool itself lives in when placed under the engine root. */
export const RESERVED_DIRECTORY_NAME = TOOL_NAME;

export const ENGINE_NAME_PREFIX = 'godot';

export const CONSOLE_MARKER = 'console';

export const CONFIG_PATH_ENV = 'GDRUN_CONFIG';

export const EXIT_CODES = {
  success: 0,
  failed: 1,
  cancelled: 2
} as const;
