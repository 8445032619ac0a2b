import * as fsp from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface Logger {
  debug(message: string, ...args: unknown[]): Promise<void>;
  info(message: string, ...args: unknown[]): Promise<void>;
  warn(message: string, ...args: unknown[]): Promise<void>;
  error(message: string, ...args: unknown[]): Promise<void>;
}

function resolveLogFile(): string {
  const logDir =
    process.env.ASSIST_LOG_DIR?.trim() ||
    path.join(os.homedir(), '.selection-assist-cli', 'logs');
  return path.join(logDir, 'app.log');
}

function shouldEcho(level: LogLevel): boolean {
  if (level === LogLevel.ERROR) {
    return true;
  }
  if (level === LogLevel.DEBUG) {
    return Boolean(process.env.ASSIST_DEBUG?.trim());
  }
  return process.env.NODE_ENV !== 'production';
}

async function log(level: LogLevel, message: string, ...args: unknown[]): Promise<void> {
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level}] ${message}`;
  const logFile = resolveLogFile();

  try {
    await fsp.mkdir(path.dirname(logFile), { recursive: true });
    await fsp.appendFile(logFile, logMessage + '\n');
  } catch (error) {
    // ファイルに書けなくても処理は止めない
    console.error(`ログファイルに書き込めません (${logFile}):`, error);
  }

  // コンソールにも出力 (ERRORレベルは常に、DEBUGはASSIST_DEBUG指定時のみ、その他は開発時のみ)
  if (shouldEcho(level)) {
    console.error(logMessage, ...args);
  }
}

export const logger: Logger = {
  debug: async (message, ...args) => await log(LogLevel.DEBUG, message, ...args),
  info: async (message, ...args) => await log(LogLevel.INFO, message, ...args),
  warn: async (message, ...args) => await log(LogLevel.WARN, message, ...args),
  error: async (message, ...args) => await log(LogLevel.ERROR, message, ...args),
};
