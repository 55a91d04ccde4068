import { format } from 'winston';

/**
 * Defines reusable Winston log formats.
 */
export const LogFormats = {
  /**
   * Simple development format with colors, timestamp, level, message, metadata, and stack trace.
   */
  developmentFormat: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
    format.splat(),
    format.colorize(),
    format.printf(({ level, message, timestamp, stack, ...metadata }) => {
      let msg = `${timestamp} [${level}]: ${message}`;
      const metaString = Object.keys(metadata).length
        ? JSON.stringify(metadata, getCircularReplacer(), 2)
        : '';
      if (metaString && metaString !== '{}') {
        msg += `\nMetadata: ${metaString}`;
      }
      if (stack) {
        msg += `\nStack: ${stack}`;
      }
      return msg;
    })
  ),

  /**
   * JSON format including timestamp, level, message, metadata, and stack trace.
   */
  productionFormat: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'label'] }),
    format.json()
  ),

  formatOperation: (operation: {
    operation: string;
    duration: number;
    success: boolean;
    requestCount?: number;
  }) => ({
    operation: {
      timestamp: new Date().toISOString(),
      ...operation,
    },
  }),
};

/**
 * Replacer for JSON.stringify that prints circular references as '[Circular]'.
 */
export const getCircularReplacer = () => {
  const seen = new WeakSet<object>();
  return (_key: string, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  };
};
