export interface ILogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string | Error, error?: Error): void;
  debug(message: string, ...args: unknown[]): void;
  isDebugEnabled(): boolean;
}

/**
 * Destination for formatted log lines.
 */
export interface ILogSink {
  appendLine(line: string): void;
}

export function formatLog(level: string, message: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  let rest = '';
  if (args && args.length) {
    rest = ' ' + args.map(a => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
  }
  return `[${timestamp}] [${level}] ${message}${rest}`;
}

export class LoggerService implements ILogger {
  constructor(private readonly sink: ILogSink, private readonly getDebug: () => boolean = () => false) {}

  isDebugEnabled(): boolean {
    return this.getDebug();
  }

  info(message: string, ...args: unknown[]) {
    this.sink.appendLine(formatLog('INFO', message, args));
  }

  warn(message: string, ...args: unknown[]) {
    this.sink.appendLine(formatLog('WARN', message, args));
  }

  error(message: string | Error, error?: Error) {
    let text: string;
    if (message instanceof Error) {
      text = message.message;
      error = message;
    } else {
      text = message;
    }
    const details = error && error.stack ? `\n${error.stack}` : '';
    this.sink.appendLine(formatLog('ERROR', `${text}${details}`, []));
  }

  debug(message: string, ...args: unknown[]) {
    if (!this.isDebugEnabled()) return;
    this.sink.appendLine(formatLog('DEBUG', message, args));
  }
}

export default LoggerService;

/**
 * Sink writing one line per entry to standard error, keeping stdout free
 * for program output.
 */
export const stderrSink: ILogSink = {
  appendLine: line => {
    process.stderr.write(`${line}\n`);
  },
};

/**
 * Creates the process logger.
 *
 * @param options.debug - Emit debug lines (default: false)
 * @param options.sink - Line destination (default: standard error)
 */
export function createLogger(options: { debug?: boolean; sink?: ILogSink } = {}): LoggerService {
  const debug = options.debug ?? false;
  return new LoggerService(options.sink ?? stderrSink, () => debug);
}
