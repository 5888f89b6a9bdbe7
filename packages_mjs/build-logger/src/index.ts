export {
    type LogLevel,
    type ImageforgeLogger,
    LOG_LEVELS,
    isLogLevel,
    getLogLevel,
    setLogLevel,
    createLogger
} from './logger.js';
