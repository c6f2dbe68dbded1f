export function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max - 3)}...`;
}

/** Like truncate, but keeps only the first line of multi-line input. */
export function truncateInput(value: string, max: number): string {
  const newline = value.indexOf("\n");
  const firstLine = newline === -1 ? value : value.slice(0, newline);
  return truncate(firstLine, max);
}

export function countLinesChars(value: string): { lines: number; chars: number } {
  if (!value) return { lines: 0, chars: 0 };
  let lines = 1;
  for (const char of value) {
    if (char === "\n") lines += 1;
  }
  return { lines, chars: value.length };
}

export function formatTokenCount(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(0)}K`;
  return String(count);
}

export function formatRunDuration(elapsedMs: number): string {
  const totalSeconds = Math.round(Math.max(0, elapsedMs) / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds === 0 ? `${minutes}m` : `${minutes}m${seconds}s`;
}

export function formatToolDuration(elapsedMs: number): string {
  const ms = Math.max(0, Math.round(elapsedMs));
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Number((ms / 1000).toFixed(3))}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Number(((ms % 60_000) / 1000).toFixed(3));
  return `${minutes}m${seconds}s`;
}

export function formatClock(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Whole percentage, with exact halves rounded to the even neighbour (1/8 → 12). */
export function formatPercent(part: number, total: number): string {
  if (total <= 0) return "0%";
  const value = (part / total) * 100;
  const floor = Math.floor(value);
  const fraction = value - floor;
  let rounded = fraction > 0.5 ? floor + 1 : floor;
  if (fraction === 0.5 && floor % 2 !== 0) rounded = floor + 1;
  return `${rounded}%`;
}
