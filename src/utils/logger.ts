/**
 * Progress lines for `wrightly run` and the script runner.
 *
 * Everything is written to stderr; stdout carries only `--json` results.
 * Each line starts with an icon so a run can be scanned by eye.
 */

const ICONS = {
  info: 'ℹ️ ',
  step: '📋',
  passed: '✅',
  failed: '❌',
  warn: '⚠️ ',
  error: '💥',
  browser: '🌐',
} as const;

const RULE = '─'.repeat(50);

function emit(icon: string, message: string): void {
  process.stderr.write(`${icon} ${message}\n`);
}

// `[3/10]`, one-based.
function position(index: number, total: number): string {
  return `[${String(index + 1)}/${String(total)}]`;
}

export function info(message: string): void {
  emit(ICONS.info, message);
}

/** Indented continuation of the previous line. */
export function detail(message: string): void {
  emit('  ', message);
}

export function step(index: number, total: number, description: string): void {
  emit(ICONS.step, `${position(index, total)} ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  passed: boolean,
  description: string,
): void {
  emit(passed ? ICONS.passed : ICONS.failed, `${position(index, total)} ${description}`);
}

export function section(title: string): void {
  process.stderr.write(`\n${RULE}\n▶  ${title}\n${RULE}\n`);
}

export function warn(message: string): void {
  emit(ICONS.warn, message);
}

export function error(message: string): void {
  emit(ICONS.error, message);
}

/** Browser lifecycle, printed only for verbose sessions. */
export function browser(message: string): void {
  emit(ICONS.browser, message);
}
