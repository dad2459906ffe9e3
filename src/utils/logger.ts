import pino from 'pino';

const logger = pino({
  name: 'couch-connect',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
