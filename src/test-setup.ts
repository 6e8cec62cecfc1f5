import { logger } from './logger.js';

// Keep test output readable
logger.silent = true;
