import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

const options: pino.LoggerOptions = {
  level: cfg.logLevel,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = cfg.logFile
  ? pino(
      options,
      pino.multistream([
        { stream: process.stdout },
        { stream: pino.destination({ dest: cfg.logFile, mkdir: true, sync: false }) },
      ]),
    )
  : pino(options);
