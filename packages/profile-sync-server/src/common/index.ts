export {
  createLogger,
  serverLog,
  httpLog,
  serviceLog,
  sessionLog,
  configLog,
} from './logger.js';
