/**
 * Local-time formatting used in frame names, notifications and status.
 */

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** 2026-01-02 03:04:05 */
export function formatLocalDateTime(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

/** 20260102_030405 */
export function formatCompactDateTime(d: Date): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}
