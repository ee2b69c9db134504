import { DateTimeUtils } from '../../src/utils/date-time';

describe('DateTimeUtils', () => {
    test('computes the calendar date in the clinic timezone', () => {
        // 22:30 UTC is already the next day in Dubai (UTC+4)
        const lateEvening = new Date('2026-03-02T22:30:00Z');
        expect(DateTimeUtils.today('Asia/Dubai', lateEvening)).toBe('2026-03-03');
        expect(DateTimeUtils.today('UTC', lateEvening)).toBe('2026-03-02');
    });

    test('reads the wall-clock time in the clinic timezone', () => {
        expect(DateTimeUtils.currentTime('Asia/Dubai', new Date('2026-03-02T08:05:00Z'))).toBe('12:05');
        expect(DateTimeUtils.currentTime('Asia/Dubai', new Date('2026-03-02T20:30:00Z'))).toBe('00:30');
    });

    test('validates ISO dates', () => {
        expect(DateTimeUtils.isIsoDate('2026-02-28')).toBe(true);
        expect(DateTimeUtils.isIsoDate('2026-02-30')).toBe(false);
        expect(DateTimeUtils.isIsoDate('2026-2-3')).toBe(false);
        expect(DateTimeUtils.isIsoDate('tomorrow')).toBe(false);
    });

    test('normalizes clock times', () => {
        expect(DateTimeUtils.normalizeTime('9:00')).toBe('09:00');
        expect(DateTimeUtils.normalizeTime(' 14:30 ')).toBe('14:30');
        expect(DateTimeUtils.normalizeTime('24:00')).toBeNull();
        expect(DateTimeUtils.normalizeTime('9am')).toBeNull();
    });

    test('adds days across month and year boundaries', () => {
        expect(DateTimeUtils.addDays('2026-02-27', 2)).toBe('2026-03-01');
        expect(DateTimeUtils.addDays('2026-12-31', 1)).toBe('2027-01-01');
        expect(DateTimeUtils.addDays('2026-03-02', 0)).toBe('2026-03-02');
    });

    test('compares ISO dates', () => {
        expect(DateTimeUtils.isBefore('2026-03-01', '2026-03-02')).toBe(true);
        expect(DateTimeUtils.isBefore('2026-03-02', '2026-03-02')).toBe(false);
    });
});
