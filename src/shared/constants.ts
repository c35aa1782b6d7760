/**
 * Application-wide constants
 */

/** Directory under the working directory that holds gridwalk files */
export const GRIDWALK_DIR = '.gridwalk';

/** Config file names looked up under the working directory, in order */
export const CONFIG_FILE_CANDIDATES = ['gridwalk.yaml', `${GRIDWALK_DIR}/config.yaml`] as const;

/** Default debug log file (relative to the working directory) */
export const DEFAULT_DEBUG_LOG_FILE = `${GRIDWALK_DIR}/logs/debug.log`;

/** Region size used when neither the config file nor the CLI gives one */
export const DEFAULT_REGION_WIDTH = 100;
export const DEFAULT_REGION_HEIGHT = 100;

/** Steps requested when none are specified */
export const DEFAULT_STEP_COUNT = 100;

/** Summary progress line frequency (in committed steps) */
export const DEFAULT_PROGRESS_EVERY = 10;

/** Replay frame interval in milliseconds */
export const DEFAULT_REPLAY_INTERVAL_MS = 50;
