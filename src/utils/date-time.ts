const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const CLOCK_TIME = /^(\d{1,2}):(\d{2})$/;

export class DateTimeUtils {
    /**
     * Calendar date ("YYYY-MM-DD") of the given instant in the clinic's timezone
     */
    static today(timezone: string, now: Date = new Date()): string {
        // en-CA formats as YYYY-MM-DD
        return now.toLocaleDateString('en-CA', {
            timeZone: timezone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit'
        });
    }

    /**
     * Wall-clock time ("HH:MM", 24h) of the given instant in the clinic's timezone
     */
    static currentTime(timezone: string, now: Date = new Date()): string {
        return now.toLocaleTimeString('en-GB', {
            timeZone: timezone,
            hour: '2-digit',
            minute: '2-digit',
            hourCycle: 'h23'
        });
    }

    static isIsoDate(value: string): boolean {
        const match = ISO_DATE.exec(value);
        if (!match) return false;

        const [, year, month, day] = match;
        const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
        return date.getUTCFullYear() === Number(year)
            && date.getUTCMonth() === Number(month) - 1
            && date.getUTCDate() === Number(day);
    }

    /**
     * "9:00" -> "09:00"; null for anything that is not a 24h clock time
     */
    static normalizeTime(value: string): string | null {
        const match = CLOCK_TIME.exec(value.trim());
        if (!match) return null;

        const hours = Number(match[1]);
        const minutes = Number(match[2]);
        if (hours > 23 || minutes > 59) return null;

        return `${String(hours).padStart(2, '0')}:${match[2]}`;
    }

    static addDays(isoDate: string, days: number): string {
        const [year, month, day] = isoDate.split('-').map(Number);
        const date = new Date(Date.UTC(year, month - 1, day + days));
        return date.toISOString().split('T')[0];
    }

    static isBefore(isoDate: string, otherIsoDate: string): boolean {
        // Zero-padded ISO dates order lexicographically
        return isoDate < otherIsoDate;
    }
}
