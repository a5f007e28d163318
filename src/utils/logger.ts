/**
 * Console logger for docgov
 *
 * Prefixed, optionally coloured lines on stdout (errors on stderr), with
 * quiet/verbose/timestamp modes and a minimal TTY spinner.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface LoggerOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
  timestamps: boolean;
}

export interface SpinnerController {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  quiet: false,
  verbose: false,
  noColor: false,
  timestamps: false,
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
} as const;

type Color = keyof typeof COLORS;

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const NOOP_SPINNER: SpinnerController = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
  stop: () => {},
};

// ============================================================================
// LOGGER
// ============================================================================

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  discovery(message: string): void {
    this.write('🔍 ', message, 'cyan');
  }

  analysis(message: string): void {
    this.write('🔬 ', message, 'blue');
  }

  inference(message: string): void {
    this.write('🧠 ', message, 'magenta');
  }

  success(message: string): void {
    this.write('✓ ', message, 'green');
  }

  warning(message: string): void {
    this.write('⚠ ', message, 'yellow');
  }

  error(message: string): void {
    console.error(this.decorate('✗ ', message, 'red'));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.write('→ ', message, 'dim');
  }

  section(title: string): void {
    if (this.options.quiet) return;
    console.log(this.color(`=== ${title} ===`, 'bold'));
  }

  info(key: string, value: string | number | boolean): void {
    if (this.options.quiet) return;
    console.log(`  ${this.color(`${key}:`, 'dim')} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    if (this.options.quiet) return;
    console.log(`${'  '.repeat(indent)}• ${text}`);
  }

  blank(): void {
    if (this.options.quiet) return;
    console.log('');
  }

  /**
   * Animated spinner on interactive terminals. Quiet and timestamp modes
   * (CI logs) get a no-op controller; non-TTY output gets plain lines.
   */
  spinner(text: string): SpinnerController {
    if (this.options.quiet || this.options.timestamps) {
      return NOOP_SPINNER;
    }

    if (!process.stdout.isTTY) {
      return {
        update: () => {},
        succeed: (done?: string) => this.success(done ?? text),
        fail: (failed?: string) => this.error(failed ?? text),
        stop: () => {},
      };
    }

    let current = text;
    let frame = 0;
    const render = (): void => {
      process.stdout.write(`\r${this.color(SPINNER_FRAMES[frame], 'cyan')} ${current}`);
      frame = (frame + 1) % SPINNER_FRAMES.length;
    };
    render();
    const timer = setInterval(render, 80);
    timer.unref();

    const clear = (): void => {
      clearInterval(timer);
      process.stdout.write('\r\x1b[K');
    };

    return {
      update: (next: string) => {
        current = next;
      },
      succeed: (done?: string) => {
        clear();
        this.success(done ?? current);
      },
      fail: (failed?: string) => {
        clear();
        this.error(failed ?? current);
      },
      stop: clear,
    };
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private write(prefix: string, message: string, color: Color): void {
    if (this.options.quiet) return;
    console.log(this.decorate(prefix, message, color));
  }

  private decorate(prefix: string, message: string, color: Color): string {
    const line = `${this.color(prefix.trimEnd(), color)} ${message}`;
    return this.options.timestamps ? `[${new Date().toISOString()}] ${line}` : line;
  }

  private color(text: string, color: Color): string {
    if (this.options.noColor) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }
}

export const logger = new Logger();

export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
