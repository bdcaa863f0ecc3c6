/**
 * Config module exports.
 */

export type {
  SimulationConfig,
  SimulationConfigInput,
  PropagationMode,
} from './config-schema.js';
export {
  DEFAULT_CONFIG,
  LOG_LEVELS,
  PROPAGATION_MODES,
  simulationConfigSchema,
} from './config-schema.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAME,
  createConfigLoader,
  loadConfig,
  resolveSimulationConfig,
} from './config-loader.js';
