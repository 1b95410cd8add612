/**
 * Shared constants for cloud-shrink
 */

/** Video container extensions eligible for re-encoding */
export const VIDEO_EXTENSIONS = [
  '.mp4',
  '.mkv',
  '.avi',
  '.mov',
  '.wmv',
  '.m4v',
  '.flv',
  '.webm',
  '.ts',
  '.m2ts',
  '.mpg',
  '.mpeg',
] as const;

/** Default exclusion directory names */
export const DEFAULT_EXCLUSION_DIRS = ['$recycle.bin', '.trash', 'samples', 'sample'] as const;

/** Default exclusion file patterns (regex strings) */
export const DEFAULT_EXCLUSION_PATTERNS = [
  '-sample\\.', // sample files like movie-sample.mkv
  '\\bsample\\b',
] as const;

/** Default paths for configuration files */
export const DEFAULT_CONFIG_PATHS = {
  /** XDG config directory name */
  xdgDirName: 'cloud-shrink',
  /** Config filename */
  configFile: 'config.json',
  /** Legacy config filename (in home) */
  legacyConfigFile: '.cloud-shrink.json',
  /** System-wide config paths */
  systemPaths: ['/etc/cloud-shrink/config.json'],
} as const;

/** Default state file names, placed under the data directory */
export const DEFAULT_PATHS = {
  dataDirName: 'cloud-shrink',
  historyFile: 'history.json',
  logFile: 'cloud-shrink.log',
  lockFile: 'cloud-shrink.lock',
} as const;

/** Marker inserted before the extension of in-progress encoder output */
export const TEMP_MARKER = '.partial';

/**
 * Windows file attribute bits used by cloud-sync providers.
 * A file is local iff neither bit is set.
 */
export const FILE_ATTRIBUTE_OFFLINE = 0x1000;
export const FILE_ATTRIBUTE_RECALL_ON_DATA_ACCESS = 0x400000;

/** Exit code used after an interrupt signal (128 + SIGINT) */
export const INTERRUPTED_EXIT_CODE = 130;
