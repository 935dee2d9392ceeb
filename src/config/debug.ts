export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logIndex: boolean;
  logResolver: boolean;
  logComposer: boolean;
  logCodec: boolean;
  logValidation: boolean;
  logExtractor: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  enableStageTiming: boolean;
  enableTokenTracking: boolean;
}

const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'json' ? 'json' : defaultValue;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.CATALOG_DEBUG_MODE, false);
  // Category switches only count in debug mode; each defaults to on there
  const category = (name: string) => enabled && toBool(process.env[name], true);

  return {
    enabled,
    logIndex: category('CATALOG_DEBUG_INDEX'),
    logResolver: category('CATALOG_DEBUG_RESOLVER'),
    logComposer: category('CATALOG_DEBUG_COMPOSER'),
    logCodec: category('CATALOG_DEBUG_CODEC'),
    logValidation: category('CATALOG_DEBUG_VALIDATION'),
    logExtractor: category('CATALOG_DEBUG_EXTRACTOR'),
    logLevel: toLogLevel(process.env.CATALOG_LOG_LEVEL, LogLevel.INFO),
    logFormat: toLogFormat(process.env.CATALOG_LOG_FORMAT, 'pretty'),
    enableStageTiming: toBool(process.env.CATALOG_ENABLE_STAGE_TIMING, true),
    enableTokenTracking: toBool(process.env.CATALOG_ENABLE_TOKEN_TRACKING, true),
  };
}
