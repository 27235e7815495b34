import pino from 'pino';
import { config } from '../config';

const logger = pino({
  name: 'reddit-media-harvester',
  level: config.logLevel,
});

export default logger;
