/**
 * Configuration - barrel exports
 */

export {
  getDefaultWalkConfig,
  parseWalkConfig,
  resolveConfigPath,
  loadWalkConfig,
  mergeWalkConfig,
  type WalkConfigOverrides,
} from './walkConfig.js';
