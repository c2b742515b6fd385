/**
 * Console output helpers.
 *
 * Cyan component tag for progress, green "*" for success, yellow "!" for
 * warnings, red "x" for errors.
 */

const useColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function paint(code: string, text: string): string {
  return useColor ? `\x1b[${code}m${text}\x1b[0m` : text;
}

export const green = (text: string): string => paint('32', text);
export const yellow = (text: string): string => paint('33', text);
export const red = (text: string): string => paint('31', text);
export const cyan = (text: string): string => paint('36', text);
export const dim = (text: string): string => paint('2', text);

export const RULE = '='.repeat(78);
export const THIN_RULE = '-'.repeat(78);

export interface Logger {
  log(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(tag: string): Logger {
  return {
    log: (message) => console.log(`${cyan(`[${tag}]`)} ${message}`),
    success: (message) => console.log(`${green('*')} ${message}`),
    warn: (message) => console.warn(`${yellow('!')} ${message}`),
    error: (message) => console.error(`${red('x')} ${message}`),
  };
}

export function header(title: string): void {
  console.log('');
  console.log(RULE);
  console.log(`➡️  ${title}`);
  console.log(RULE);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
