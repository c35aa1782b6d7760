export {
  renderPath,
  renderFrame,
  pathFrames,
  type RenderOptions,
} from './pathRenderer.js';
export { playReplay, type ReplayOptions } from './replay.js';
export {
  formatStatisticsReport,
  printStatisticsReport,
  toStatisticsJson,
  type StatisticsJson,
} from './statisticsReport.js';
