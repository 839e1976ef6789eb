export {
  DEFAULT_BASE_RESERVE,
  getNodeEnv,
  isTest,
  loadConsensusConfig,
} from './config.js';
