type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const isDebugEnabled = (): boolean => {
  const value = process.env.DEVENV_DEBUG;
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
};

const emit = (level: 'error' | 'debug', message: string, context?: LogContext): void => {
  // stdout carries command output (and `--json` reports); diagnostics go to stderr.
  if (level === 'debug' && !isDebugEnabled()) return;
  if (context && Object.keys(context).length > 0) {
    console.error(message, context);
    return;
  }
  console.error(message);
};

export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
