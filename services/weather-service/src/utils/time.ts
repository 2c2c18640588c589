export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Wall-clock `HH:MM` for a UTC instant shifted by a provider offset.
 */
export function formatLocalTime(utcMs: number, offsetSeconds: number): string {
    const local = new Date(utcMs + offsetSeconds * 1000);
    return `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}`;
}

/**
 * Local calendar date (`yyyy-MM-dd`) of a unix timestamp in seconds.
 */
export function localIsoDate(unixSeconds: number, offsetSeconds: number): string {
    const local = new Date((unixSeconds + offsetSeconds) * 1000);
    return `${local.getUTCFullYear()}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
}
