/**
 * Rubricate CLI theme
 * Colors, icons and small formatters shared by every command.
 */

import type { ScoreLevel } from '../schemas/types.js';

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',

  brightBlack: '\x1b[90m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
};

export const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,

  success: (text: string) => `${colors.green}${text}${colors.reset}`,
  error: (text: string) => `${colors.red}${text}${colors.reset}`,
  warning: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  info: (text: string) => `${colors.cyan}${text}${colors.reset}`,
  highlight: (text: string) => `${colors.brightMagenta}${text}${colors.reset}`,
  muted: (text: string) => `${colors.brightBlack}${text}${colors.reset}`,

  primary: (text: string) => `${colors.brightCyan}${text}${colors.reset}`,
  command: (text: string) => `${colors.bold}${colors.cyan}${text}${colors.reset}`,
  path: (text: string) => `${colors.brightBlue}${text}${colors.reset}`,
  number: (text: string) => `${colors.brightYellow}${text}${colors.reset}`,
  label: (text: string) => `${colors.dim}${text}${colors.reset}`,
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  arrowRight: '▸',

  rocket: '🚀',
  question: '❓',
  rubric: '📏',
  answer: '💬',
  target: '🎯',
  chart: '📊',
  note: '📝',
  book: '📚',
  file: '📄',
  magnify: '🔍',
  sparkle: '✨',
};

export const box = {
  horizontal: '─',
  dHorizontal: '═',
};

export const BANNER_MINIMAL = `${style.highlight('rubricate')} ${style.muted('·')} ${style.dim('LLM-written questions, rubric-graded answers')}`;

export function header(title: string): string {
  const width = 60;
  return `\n${style.primary(box.dHorizontal.repeat(width))}
${style.bold(title)}
${style.primary(box.dHorizontal.repeat(width))}\n`;
}

export function subheader(title: string): string {
  return `\n${style.bold(title)}\n${style.dim(box.horizontal.repeat(40))}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.label(key + ':')} ${value}`;
}

export function scoreLevel(level: ScoreLevel): string {
  const text = level.toUpperCase();
  switch (level) {
    case 'excellent':
      return style.bold(style.success(text));
    case 'adequate':
      return style.bold(style.warning(text));
    case 'poor':
      return style.bold(style.error(text));
  }
}

export interface SpinnerOptions {
  silent?: boolean;
}

export class Spinner {
  private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private frameIndex = 0;
  private intervalId: NodeJS.Timeout | null = null;
  private text: string;
  private silent: boolean;
  private animated: boolean;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.text = text;
    this.silent = options.silent ?? false;
    this.animated = !this.silent && Boolean(process.stdout.isTTY);
  }

  start(): void {
    if (!this.animated) {
      return;
    }
    process.stdout.write('\x1b[?25l'); // Hide cursor
    this.render();
    this.intervalId = setInterval(() => {
      this.frameIndex = (this.frameIndex + 1) % this.frames.length;
      this.render();
    }, 80);
  }

  private render(): void {
    process.stdout.write(`\r\x1b[2K${style.info(this.frames[this.frameIndex])} ${this.text}`);
  }

  update(text: string): void {
    this.text = text;
    if (this.animated) {
      this.render();
    } else if (!this.silent) {
      console.log(`  ${style.dim(icons.arrowRight)} ${text}`);
    }
  }

  succeed(text?: string): void {
    this.finish(style.success(icons.success), text);
  }

  fail(text?: string): void {
    this.finish(style.error(icons.error), text);
  }

  warn(text?: string): void {
    this.finish(style.warning(icons.warning), text);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    if (this.animated) {
      process.stdout.write('\x1b[?25h'); // Show cursor
      process.stdout.write('\r\x1b[2K');
    }
  }

  private finish(icon: string, text?: string): void {
    this.stop();
    if (!this.silent) {
      console.log(`${icon} ${text || this.text}`);
    }
  }
}

export function formatError(message: string, suggestions?: string[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.error(`${icons.error} Error:`)} ${message}`);

  if (suggestions && suggestions.length > 0) {
    lines.push('');
    lines.push(style.dim('  Suggestions:'));
    for (const suggestion of suggestions) {
      lines.push(`    ${style.dim(icons.arrowRight)} ${suggestion}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/** Removes ANSI styling, for plain-text comparisons and width math. */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, '');
}
