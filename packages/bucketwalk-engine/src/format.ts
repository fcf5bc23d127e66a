/**
 * Display formatting shared by the view model and the shell.
 */

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

export function formatBytes(bytes: number): string {
  let v = bytes;
  let i = 0;
  while (Math.abs(v) >= 1024 && i < UNITS.length - 1) {
    v /= 1024;
    i++;
  }
  const digits = i === 0 ? 0 : Math.abs(v) >= 10 ? 1 : 2;
  return `${v.toFixed(digits)} ${UNITS[i]}`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:mm:ss` in UTC, so listings read the same on every machine.
 */
export function formatDateTime(value: Date | undefined): string {
  if (!value || Number.isNaN(value.getTime())) return '';
  return (
    `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())} ` +
    `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`
  );
}

export function formatPercent(done: number, total: number | undefined): string | undefined {
  if (!total || total <= 0) return undefined;
  return `${Math.min(100, Math.floor((done / total) * 100))}%`;
}
