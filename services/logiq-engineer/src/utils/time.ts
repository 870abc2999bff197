const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Wall-clock parts of `date` at a fixed UTC offset.
 */
function shifted(date: Date, offsetMinutes: number): Date {
  return new Date(date.getTime() + offsetMinutes * 60000);
}

/** `YYYY-MM-DD HH:mm:ss` in the service time zone. */
export function formatTimestamp(date: Date, offsetMinutes: number): string {
  const d = shifted(date, offsetMinutes);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/** `YYYY-MM-DD` in the service time zone. */
export function formatDate(date: Date, offsetMinutes: number): string {
  return formatTimestamp(date, offsetMinutes).slice(0, 10);
}

/** `Month DD, YYYY`, e.g. `November 06, 2025`. */
export function formatDisplayDate(date: Date, offsetMinutes: number): string {
  const d = shifted(date, offsetMinutes);
  return `${MONTHS[d.getUTCMonth()]} ${pad(d.getUTCDate())}, ${d.getUTCFullYear()}`;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
