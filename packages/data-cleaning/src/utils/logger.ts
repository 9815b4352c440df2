import winston from 'winston';
import { RuntimeEnvSchema, type RuntimeEnv } from '../config/schema';

export interface ResolvedRuntimeEnv {
  env: RuntimeEnv;
  rejectedLogLevel?: string;
}

// An unknown LOG_LEVEL falls back to info instead of failing the import
export function resolveRuntimeEnv(source: NodeJS.ProcessEnv = process.env): ResolvedRuntimeEnv {
  const parsed = RuntimeEnvSchema.safeParse(source);
  if (parsed.success) {
    return { env: parsed.data };
  }
  return {
    env: { NODE_ENV: source.NODE_ENV, LOG_LEVEL: 'info' },
    rejectedLogLevel: source.LOG_LEVEL
  };
}

const { env, rejectedLogLevel } = resolveRuntimeEnv();

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'data-cleaning' },
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test'
    })
  ]
});

if (rejectedLogLevel !== undefined) {
  logger.warn('Unknown LOG_LEVEL, using info', { LOG_LEVEL: rejectedLogLevel });
}

export function createComponentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export default logger;
