type Fields = Record<string, unknown>;
type Level = 'debug' | 'info' | 'warn' | 'error';

function toErrorPayload(err: unknown) {
  if (!err) return undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

const RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(value: string): value is Level {
  return value in RANK;
}

// LOG_LEVEL is read per call so tests and a changed environment take effect at once
function enabled(level: Level) {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  return RANK[level] >= (isLevel(configured) ? RANK[configured] : RANK.info);
}

function emit(level: Level, msg: string | undefined, fields: Fields) {
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...fields,
    msg: msg || (typeof fields.msg === 'string' ? fields.msg : ''),
  };
  // Normalize embedded error if present
  if (fields.err !== undefined) {
    payload.err = toErrorPayload(fields.err);
  }
  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  info(arg1?: string | Fields, arg2?: string): void;
  warn(arg1?: string | Fields, arg2?: string): void;
  error(arg1?: string | Fields, arg2?: string): void;
  debug(arg1?: string | Fields, arg2?: string): void;
  child(bindings: Fields): Logger;
}

function createLogger(bindings: Fields = {}): Logger {
  const log = (level: Level, arg1?: string | Fields, arg2?: string) => {
    if (!enabled(level)) return;
    if (typeof arg1 === 'string') return emit(level, arg1, bindings);
    emit(level, arg2, { ...bindings, ...(arg1 || {}) });
  };
  return {
    info: (arg1, arg2) => log('info', arg1, arg2),
    warn: (arg1, arg2) => log('warn', arg1, arg2),
    error: (arg1, arg2) => log('error', arg1, arg2),
    debug: (arg1, arg2) => log('debug', arg1, arg2),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger = createLogger();

export type { Fields };
