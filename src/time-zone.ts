/**
 * Wall-clock helpers for an IANA time zone.
 * WebUntis reports local school times without an offset, so every conversion
 * between instants and calendar dates goes through the configured zone.
 */

interface ZonedParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
    let formatter = formatters.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
            hourCycle: 'h23',
        });
        formatters.set(timeZone, formatter);
    }
    return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
    try {
        getFormatter(timeZone);
        return true;
    } catch {
        return false;
    }
}

export function zonedParts(instant: Date, timeZone: string): ZonedParts {
    const values = new Map<string, number>();
    for (const part of getFormatter(timeZone).formatToParts(instant)) {
        if (part.type !== 'literal') {
            values.set(part.type, Number(part.value));
        }
    }
    return {
        year: values.get('year') ?? 0,
        month: values.get('month') ?? 1,
        day: values.get('day') ?? 1,
        hour: values.get('hour') ?? 0,
        minute: values.get('minute') ?? 0,
        second: values.get('second') ?? 0,
    };
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds.
 */
function offsetMs(instant: Date, timeZone: string): number {
    const p = zonedParts(instant, timeZone);
    const wallClock = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
    const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
    return wallClock - wholeSeconds;
}

const pad = (value: number, length = 2): string => String(value).padStart(length, '0');

/**
 * Calendar date (YYYY-MM-DD) of the instant in the zone.
 */
export function dateKey(instant: Date, timeZone: string): string {
    const p = zonedParts(instant, timeZone);
    return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;
}

function parseDateKey(key: string): [number, number, number] {
    const [year, month, day] = key.split('-').map(Number);
    return [year, month, day];
}

export function addDays(key: string, days: number): string {
    const [year, month, day] = parseDateKey(key);
    return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

/**
 * Instant at which the zone's wall clock shows the given date and time.
 */
export function zonedTimeToInstant(key: string, hour: number, minute: number, timeZone: string): Date {
    const [year, month, day] = parseDateKey(key);
    const wallClock = Date.UTC(year, month - 1, day, hour, minute);
    const guess = wallClock - offsetMs(new Date(wallClock), timeZone);
    return new Date(wallClock - offsetMs(new Date(guess), timeZone));
}

/**
 * ISO-8601 with the zone's offset, e.g. 2026-10-19T08:00:00+02:00.
 */
export function formatZoned(instant: Date, timeZone: string): string {
    const p = zonedParts(instant, timeZone);
    const offsetMinutes = Math.round(offsetMs(instant, timeZone) / 60000);
    const sign = offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(offsetMinutes);
    return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}` +
        `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}
