/**
 * Console formatting for benchmark output.
 */

export const Colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

export function colorize(text: string, color: string): string {
  return `${color}${text}${Colors.reset}`;
}

export function fmt(n: number): string {
  return n.toLocaleString("en-US");
}

export function fmtMs(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function fmtKm2(km2: number): string {
  if (km2 >= 1_000_000) return `${(km2 / 1_000_000).toFixed(1)}M km²`;
  if (km2 >= 1_000) return `${(km2 / 1_000).toFixed(1)}k km²`;
  return `${km2.toFixed(1)} km²`;
}

const BOX_WIDTH = 78;

export function header(title: string): void {
  const pad = Math.max(0, BOX_WIDTH - title.length - 2);
  const left = Math.floor(pad / 2);
  console.log(colorize(`  ╔${"═".repeat(BOX_WIDTH)}╗`, Colors.cyan));
  console.log(
    colorize(`  ║${" ".repeat(left + 1)}${title}${" ".repeat(pad - left + 1)}║`, Colors.cyan),
  );
  console.log(colorize(`  ╚${"═".repeat(BOX_WIDTH)}╝`, Colors.cyan));
}

export function sectionTitle(num: string, title: string): void {
  console.log(colorize(`  ┌─ ${num}. ${title}`, Colors.cyan));
}

const COL_WIDTHS = [12, 14, 12, 12, 12, 10];

function padCell(text: string, width: number): string {
  const stripped = text.replace(/\x1b\[[0-9;]*m/g, "");
  return text + " ".repeat(Math.max(0, width - stripped.length));
}

export function tableHeader(cols: string[]): void {
  const cells = cols.map((c, i) => colorize(padCell(c, COL_WIDTHS[i] ?? 12), Colors.dim));
  console.log(`  │ ${cells.join("│ ")}`);
  const line = cols.map((_, i) => "─".repeat(COL_WIDTHS[i] ?? 12)).join("┼─");
  console.log(colorize(`  │ ${line}`, Colors.dim));
}

export function tableRow(cols: string[]): void {
  console.log(`  │ ${cols.map((c, i) => padCell(c, COL_WIDTHS[i] ?? 12)).join("│ ")}`);
}

export function tableDivider(): void {
  console.log(colorize(`  └${"─".repeat(BOX_WIDTH - 1)}`, Colors.dim));
}
