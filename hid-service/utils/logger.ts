import log from 'electron-log/node';
import { HID_CONFIG, LogLevelSetting, parseLogLevel } from '../config/ServiceConfig';

export type ScopedLogger = ReturnType<typeof log.scope>;

export interface LoggingOptions {
  consoleLevel: LogLevelSetting;
  fileLevel: LogLevelSetting;
}

export function configureLogging(options: LoggingOptions): void {
  log.transports.console.level = options.consoleLevel;
  log.transports.console.format = HID_CONFIG.LOG.FORMAT;

  log.transports.file.level = options.fileLevel;
  log.transports.file.format = HID_CONFIG.LOG.FORMAT;
  log.transports.file.maxSize = HID_CONFIG.LOG.MAX_FILE_SIZE;
}

export function createLogger(scope: string): ScopedLogger {
  return log.scope(scope);
}

// Usable before the service reads its full configuration
configureLogging({
  consoleLevel: parseLogLevel(process.env.HID_LOG_LEVEL, 'info'),
  fileLevel: parseLogLevel(process.env.HID_LOG_FILE_LEVEL, 'info'),
});
