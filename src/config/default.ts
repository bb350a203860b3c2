import { ArchiveConfig } from '../types';

export const VERSION = '1.0.0';

export const defaultConfig: ArchiveConfig = {
  s3: {},
  general: {
    host: 'archive.org',
    s3Host: 's3.us.archive.org',
    secure: true,
  },
  logging: {},
};

export const ENV_VARS = {
  ACCESS_KEY: 'IA_ACCESS_KEY_ID',
  SECRET_KEY: 'IA_SECRET_ACCESS_KEY',
  CONFIG_FILE: 'IA_CONFIG_FILE',
};

/** Config file locations tried in order, relative to the home directory. */
export const CONFIG_FILE_CANDIDATES = [['.config', 'ia.ini'], ['.ia']];

export const DEFAULTS = {
  SEARCH_PAGE_SIZE: 100,
  RETRIES_SLEEP_SECONDS: 30,
  REQUEST_TIMEOUT_MS: 60000,
  SCANNER: `archive-toolkit Node.js library ${VERSION}`,
  USER_AGENT: `archive-toolkit/${VERSION}`,
};
