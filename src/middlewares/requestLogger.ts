import { Request } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream for Winston
const stream: StreamOptions = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

// Probes hit the health endpoints constantly
const isProbe = (req: Request): boolean => req.originalUrl.startsWith(`${env.API_PREFIX}/health`);

const skip = (req: Request): boolean => env.NODE_ENV === 'test' || (env.NODE_ENV === 'production' && isProbe(req));

// Request logger middleware
export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', { stream, skip });

export default requestLogger;
