import winston from 'winston';

export type LoggerComponent = 'grammar' | 'engine' | 'extractor' | 'rewriter';

// LOG_LEVEL wins; tests stay quiet unless TEST_LOG_LEVEL says otherwise.
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.NODE_ENV === 'test') {
    return env.TEST_LOG_LEVEL || 'error';
  }
  if (env.GLL_DEBUG === 'true') {
    return 'debug';
  }
  return 'warn';
}

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
    let line = `${String(timestamp)} [${level}]${component ? ` [${String(component)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    return line;
  }),
);

const root = winston.createLogger({
  level: resolveLogLevel(),
  levels: winston.config.npm.levels,
  format: consoleFormat,
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
});

const children = new Map<LoggerComponent, winston.Logger>();

export function getLogger(component: LoggerComponent): winston.Logger {
  let logger = children.get(component);
  if (!logger) {
    logger = root.child({ component });
    children.set(component, logger);
  }
  return logger;
}

export function setLogLevel(level: string): void {
  root.level = level;
}
