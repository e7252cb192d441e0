export const TOOL_NAME = 'zipcraft';

export const CONFIG_FILE_NAME = '.zipcraft.jsonc';
export const PYPROJECT_FILE_NAME = 'pyproject.toml';
export const PYPROJECT_TOOL_TABLE = 'zipcraft';

export const CACHE_DIR = '.zipcraft';
export const MANIFEST_DIR = '.zipcraft/cache';

// Always dropped, whatever the include/exclude/gitignore settings say
export const HARDCODED_EXCLUDES = [
  '**/.git/**',
  '**/.hg/**',
  '**/.svn/**',
  '**/__pycache__/**',
  '**/*.pyc',
  '**/*.pyo',
  `${CACHE_DIR}/**`,
];

export const DEFAULT_OUTPUT_PATH = 'dist/bundle.pyz';
export const DEFAULT_OUTPUT_EXTENSION = '.pyz';
export const DEFAULT_INTERPRETER = '/usr/bin/env python3';
export const DEFAULT_COMPRESSION_LEVEL = 6;
export const DEFAULT_WATCH_INTERVAL_MS = 1000;
export const DEFAULT_DEBOUNCE_MS = 500;

export const MAIN_MODULE_NAME = '__main__.py';
export const PKG_INFO_NAME = 'PKG-INFO';
export const PKG_INFO_METADATA_VERSION = '2.1';

export const BUILD_TIMESTAMP_PLACEHOLDER = '<build-timestamp>';
export const DEFAULT_LICENSE_FALLBACK =
  'All rights reserved. See additional license files if distributed alongside this file for additional terms.';

// 1980-01-01 00:00 local: the earliest DOS timestamp a zip entry can carry
export const ZIP_ENTRY_MTIME = new Date(1980, 0, 1, 0, 0, 0);

// Environment keys
export const ENV_DISABLE_BUILD_TIMESTAMP = 'DISABLE_BUILD_TIMESTAMP';
export const ENV_RESPECT_GITIGNORE = 'RESPECT_GITIGNORE';
export const ENV_COMPRESS = 'COMPRESS';
export const ENV_WATCH_INTERVAL = 'WATCH_INTERVAL';
export const ENV_LOG_LEVEL = 'LOG_LEVEL';
