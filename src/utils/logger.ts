type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

const envLevel = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
const minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'INFO';

// Errors do not survive JSON.stringify; flatten them before they reach the entry
function serializable(data: unknown): unknown {
  if (data instanceof Error) return { name: data.name, message: data.message };
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(data)) {
      out[k] = v instanceof Error ? { name: v.name, message: v.message } : v;
    }
    return out;
  }
  return data;
}

function log(level: LogLevel, module: string, msg: string, data?: unknown) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;

  const entry = {
    time: new Date().toISOString(),
    level,
    module,
    msg,
    ...(data !== undefined && { data: serializable(data) }),
  };

  const line = JSON.stringify(entry);

  if (level === 'ERROR') {
    console.error(line);
  } else if (level === 'WARN') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  return {
    debug: (msg: string, data?: unknown) => log('DEBUG', module, msg, data),
    info: (msg: string, data?: unknown) => log('INFO', module, msg, data),
    warn: (msg: string, data?: unknown) => log('WARN', module, msg, data),
    error: (msg: string, data?: unknown) => log('ERROR', module, msg, data),
  };
}

export function redactUrl(url: string): string {
  return url.replace(/api-key=[^&]*/, 'api-key=***');
}
