/**
 * Flow logger for the relay bot.
 *
 * One line per step of an update's journey, tagged and colored so a
 * single update can be followed through the logs by its correlation id.
 *
 * Visual Language:
 *   📥 RECV     - Update received from the webhook
 *   📤 SEND     - Reply sent to the user
 *   📦 FWD      - Channel message forwarded
 *   ⌨️  CMD      - Command or button dispatched
 *   💾 STATE    - Dedup state changes
 *   ⚡ PERF     - Timing
 *   ⏭️  SKIP     - Update ignored
 *   ✅ OK       - Success
 *   ❌ ERR      - Error
 *   ⚠️  WARN     - Warning
 *   🔗 LINK     - Bot API call
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface DebugConfig {
  enabled: boolean;
  minLevel: LogLevel;
  showTimestamp: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.DEBUG_LEVEL;

const config: DebugConfig = {
  enabled: process.env.DEBUG_LOGS !== '0',
  minLevel: isLogLevel(envLevel) ? envLevel : 'debug',
  showTimestamp: process.env.DEBUG_TIMESTAMP !== '0',
};

/**
 * Format a value for display (truncate if too long)
 */
function formatValue(value: unknown, maxLen = 80): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') {
    const clean = value.replace(/\n/g, '↵').trim();
    return clean.length > maxLen ? clean.substring(0, maxLen) + '…' : clean;
  }
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > maxLen ? str.substring(0, maxLen) + '…' : str;
  }
  return String(value);
}

function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

function formatCid(cid?: string): string {
  if (!cid) return '';
  return `${colors.dim}[${cid}]${colors.reset} `;
}

const TAG_COLORS: Record<string, string> = {
  RECV: colors.cyan,
  SEND: colors.green,
  FWD: colors.magenta,
  CMD: colors.blue,
  STATE: colors.dim,
  PERF: colors.bright,
  SKIP: colors.dim,
  OK: colors.green,
  ERR: colors.red,
  WARN: colors.yellow,
  LINK: colors.cyan,
};

type LogData = Record<string, unknown>;

class DebugLogger {
  constructor(private readonly context: string) {}

  private shouldLog(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private log(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: LogData,
    cid?: string,
  ) {
    if (!this.shouldLog(level)) return;

    const tagColor = TAG_COLORS[tag] ?? colors.white;
    const paddedTag = tag.padEnd(7);

    let line = `${timestamp()}${formatCid(cid)}${emoji} ${tagColor}${paddedTag}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ');
      line += ` ${dataStr}`;
    }

    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  recv(message: string, data?: LogData, cid?: string) {
    this.log('info', '📥', 'RECV', message, data, cid);
  }

  send(message: string, data?: LogData, cid?: string) {
    this.log('info', '📤', 'SEND', message, data, cid);
  }

  forward(message: string, data?: LogData, cid?: string) {
    this.log('info', '📦', 'FWD', message, data, cid);
  }

  command(message: string, data?: LogData, cid?: string) {
    this.log('info', '⌨️ ', 'CMD', message, data, cid);
  }

  state(message: string, data?: LogData, cid?: string) {
    this.log('debug', '💾', 'STATE', message, data, cid);
  }

  perf(message: string, ms: number, cid?: string) {
    const formatted = formatMs(ms);
    const color = ms < 100 ? colors.green : ms < 500 ? colors.yellow : colors.red;
    this.log('info', '⚡', 'PERF', message, { time: `${color}${formatted}${colors.reset}` }, cid);
  }

  skip(message: string, data?: LogData, cid?: string) {
    this.log('debug', '⏭️ ', 'SKIP', message, data, cid);
  }

  ok(message: string, data?: LogData, cid?: string) {
    this.log('info', '✅', 'OK', message, data, cid);
  }

  err(message: string, data?: LogData, cid?: string) {
    this.log('error', '❌', 'ERR', message, data, cid);
  }

  warn(message: string, data?: LogData, cid?: string) {
    this.log('warn', '⚠️ ', 'WARN', message, data, cid);
  }

  link(message: string, data?: LogData, cid?: string) {
    this.log('debug', '🔗', 'LINK', message, data, cid);
  }

  separator(cid?: string) {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${timestamp()}${formatCid(cid)}${colors.dim}${'─'.repeat(60)}${colors.reset}`,
    );
  }

  /** Start a timer and return a function to log the elapsed time */
  timer(label: string, cid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, cid);
    };
  }
}

export function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

/**
 * Singleton loggers for common contexts
 */
export const debugLog = {
  bot: createDebugLogger('bot'),
  handlers: createDebugLogger('handlers'),
  telegram: createDebugLogger('telegram'),
};

