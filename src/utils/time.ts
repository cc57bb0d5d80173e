export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms) =>
    new Promise((resolve) => {
        setTimeout(resolve, Math.max(0, ms));
    });

/** Local ISO-8601 timestamp without fractional seconds, e.g. 2025-10-23T14:05:09 */
export const nowIso = (date: Date = new Date()): string => {
    const pad = (value: number) => String(value).padStart(2, '0');
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
        `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
};

export const secondsToMs = (seconds: number): number => Math.max(0, Math.round(seconds * 1_000));
