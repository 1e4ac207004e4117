// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
   return LEVEL_ORDER.some((l) => l === value);
}

/**
 * Where formatted lines end up. Defaults to the console; tests swap in
 * an array-backed sink.
 */
export interface LogSink {
   error(line: string, ...rest: unknown[]): void;
   warn(line: string, ...rest: unknown[]): void;
   info(line: string, ...rest: unknown[]): void;
   debug(line: string, ...rest: unknown[]): void;
}

const consoleSink: LogSink = {
   error: (line, ...rest) => console.error(line, ...rest),
   warn: (line, ...rest) => console.warn(line, ...rest),
   info: (line, ...rest) => console.log(line, ...rest),
   debug: (line, ...rest) => console.debug(line, ...rest),
};

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[postman-sync]" or "[sync]").
    */
   prefix?: string;
   sink?: LogSink;
}

const supportsColor =
   typeof process !== 'undefined' &&
   process.stdout &&
   process.stdout.isTTY &&
   process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
   red: wrap(31),
   yellow: wrap(33),
   cyan: wrap(36),
   magenta: wrap(35),
   dim: wrap(2),
   gray: wrap(90),
};

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.gray;
      default:
         return (s) => s;
   }
}

/**
 * Logger with colored, prefixed output. Children share the parent's
 * level holder, so `setLevel` on the root affects every child created
 * from it.
 */
export class Logger {
   private readonly state: { level: LogLevel };
   private readonly prefix: string | undefined;
   private readonly sink: LogSink;

   constructor(options: LoggerOptions = {}, state?: { level: LogLevel }) {
      this.state = state ?? { level: options.level ?? 'info' };
      this.prefix = options.prefix;
      this.sink = options.sink ?? consoleSink;
   }

   setLevel(level: LogLevel) {
      this.state.level = level;
   }

   getLevel(): LogLevel {
      return this.state.level;
   }

   /**
    * Create a child logger with an additional prefix.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ prefix: combined, sink: this.sink }, this.state);
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const levelColor = colorForLevel(lvl);
      const textColored = lvl === 'debug' ? color.dim(text) : levelColor(text);

      return this.prefix ? `${color.magenta(this.prefix)} ${textColored}` : textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.state.level === 'silent') return false;
      return LEVEL_ORDER.indexOf(targetLevel) <= LEVEL_ORDER.indexOf(this.state.level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      this.sink.error(this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.sink.warn(this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.sink.info(this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.sink.debug(this.formatMessage(msg, 'debug'), ...rest);
   }
}

const envLevel = process.env.POSTMAN_SYNC_LOG_LEVEL;

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via POSTMAN_SYNC_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: isLogLevel(envLevel) ? envLevel : 'info',
   prefix: '[postman-sync]',
});
