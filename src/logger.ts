import fs from 'fs';
import path from 'path';
import util from 'util';

// Tees every console call into <LOG_DIR>/app.log. Imported for its side
// effects by the entry point, after dotenv and before anything logs.
const logsDir = path.resolve(process.env.LOG_DIR ?? 'logs');
const logFilePath = path.join(logsDir, 'app.log');

const CONSOLE_METHODS = ['log', 'error', 'warn', 'info', 'debug'] as const;
type ConsoleMethod = (typeof CONSOLE_METHODS)[number];

const originalConsole: Record<ConsoleMethod, (...args: unknown[]) => void> = {
  log: console.log.bind(console),
  error: console.error.bind(console),
  warn: console.warn.bind(console),
  info: console.info.bind(console),
  debug: console.debug.bind(console),
};

function openLogStream(): fs.WriteStream | null {
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    return fs.createWriteStream(logFilePath, { flags: 'a' });
  } catch (e) {
    // File logging is optional; the app keeps running on the plain console
    originalConsole.error('Failed to open log file:', logFilePath, e);
    return null;
  }
}

function formatMessage(level: string, ...args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const messageParts = args.map(arg => {
    if (typeof arg === 'string') return arg;
    if (arg instanceof Error) return arg.stack ?? arg.message;
    return util.inspect(arg, { depth: null, colors: false, breakLength: Infinity });
  });
  return `${timestamp} [${level.toUpperCase()}] ${messageParts.join(' ')}\n`;
}

let logStream = openLogStream();

if (logStream) {
  for (const method of CONSOLE_METHODS) {
    console[method] = (...args: unknown[]) => {
      originalConsole[method](...args);
      logStream?.write(formatMessage(method, ...args));
    };
  }

  const cleanup = () => {
    logStream?.end();
    logStream = null;
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => {
    cleanup();
    process.exit();
  });
  process.on('SIGTERM', () => {
    cleanup();
    process.exit();
  });
  process.on('uncaughtException', err => {
    originalConsole.error('Uncaught Exception:', err);
    logStream?.write(formatMessage('fatal', 'Uncaught Exception:', err));
    cleanup();
    process.exit(1);
  });
} else {
  originalConsole.error('Log stream not initialized. File logging will be disabled.');
}
