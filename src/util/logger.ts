// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
   return typeof value === 'string' && LEVEL_ORDER.some((l) => l === value);
}

/**
 * Where formatted lines go. Defaults to the console; tests swap in a
 * collector.
 */
export interface LogSink {
   write(level: Exclude<LogLevel, 'silent'>, line: string, ...rest: unknown[]): void;
}

export const consoleSink: LogSink = {
   write(level, line, ...rest) {
      switch (level) {
         case 'error':
            console.error(line, ...rest);
            break;
         case 'warn':
            console.warn(line, ...rest);
            break;
         case 'debug':
            console.debug(line, ...rest);
            break;
         default:
            console.log(line, ...rest);
      }
   },
};

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[attrtype]" or "[runner]").
    */
   prefix?: string;
   sink?: LogSink;
   /**
    * Force ANSI colors on or off. Default: on for a TTY unless NO_COLOR is set.
    */
   color?: boolean;
}

const ttySupportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout?.isTTY) &&
   process.env.NO_COLOR === undefined;

type ColorFn = (text: string) => string;

function ansi(code: number): ColorFn {
   return (text: string) => `\u001b[${code}m${text}\u001b[0m`;
}

const palette = {
   red: ansi(31),
   yellow: ansi(33),
   cyan: ansi(36),
   magenta: ansi(35),
   dim: ansi(2),
};

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return palette.red;
      case 'warn':
         return palette.yellow;
      case 'info':
         return palette.cyan;
      case 'debug':
         return palette.dim;
      default:
         return (s) => s;
   }
}

/**
 * Leveled logger with optional prefix and colors.
 */
export class Logger {
   private level: LogLevel;
   private readonly prefix: string | undefined;
   private readonly sink: LogSink;
   private readonly color: boolean;

   constructor(options: LoggerOptions = {}) {
      this.level = options.level ?? 'info';
      this.prefix = options.prefix;
      this.sink = options.sink ?? consoleSink;
      this.color = options.color ?? ttySupportsColor;
   }

   setLevel(level: LogLevel) {
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.level;
   }

   /**
    * Create a child logger with an additional prefix. The child shares
    * the parent's sink, but not later level changes.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({level: this.level, prefix: combined, sink: this.sink, color: this.color});
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const paint = (fn: ColorFn, s: string) => (this.color ? fn(s) : s);
      const body = paint(colorForLevel(lvl), text);

      return this.prefix ? `${paint(palette.magenta, this.prefix)} ${body}` : body;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.level === 'silent') return false;
      return LEVEL_ORDER.indexOf(targetLevel) <= LEVEL_ORDER.indexOf(this.level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      this.sink.write('error', this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.sink.write('warn', this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.sink.write('info', this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.sink.write('debug', this.formatMessage(msg, 'debug'), ...rest);
   }
}

const envLevel = process.env.ATTRTYPE_LOG_LEVEL;

/**
 * Default process-wide logger used by the CLI and tooling.
 * Level can be controlled via ATTRTYPE_LOG_LEVEL.
 */
export const defaultLogger = new Logger({
   level: isLogLevel(envLevel) ? envLevel : 'info',
   prefix: '[attrtype]',
});
