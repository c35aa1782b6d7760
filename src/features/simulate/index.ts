export {
  runSimulation,
  type RunSimulationOptions,
  type SimulationResult,
} from './runSimulation.js';
export {
  ProgressReporter,
  attachProgressReporter,
  type ProgressReporterOptions,
} from './progressReporter.js';
