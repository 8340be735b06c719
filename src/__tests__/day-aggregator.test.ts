import { describe, expect, it } from 'vitest';
import { aggregate, schoolDayBounds } from '../day-aggregator.js';
import { at, makeDay, makeLesson } from './fixtures.js';

const mathFirst = makeLesson('2026-10-19', '08:00', '08:45', 'Math', { id: 1 });
const mathCancelled = makeLesson('2026-10-19', '08:45', '09:30', 'Math', { id: 2, status: 'cancelled' });
const englishTomorrow = makeLesson('2026-10-20', '08:00', '08:45', 'Eng', { id: 3 });

const today = makeDay('2026-10-19', [mathFirst, mathCancelled]);
const tomorrow = makeDay('2026-10-20', [englishTomorrow]);

describe('aggregate', () => {
    it('skips a cancelled next lesson and moves on to tomorrow', () => {
        const result = aggregate(today, [tomorrow], at('2026-10-19', '08:10'));

        expect(result.current).toBe(mathFirst);
        expect(result.next).toBe(englishTomorrow);
        expect(result.nextDay).toEqual(tomorrow);
        expect(result.nextWakeup).toBe(englishTomorrow);
        expect(result.day?.date).toBe('2026-10-20');
    });

    it('offers cancelled lessons when they are included', () => {
        const result = aggregate(today, [tomorrow], at('2026-10-19', '08:10'), { includeCancelled: true });

        expect(result.next).toBe(mathCancelled);
        expect(result.nextDay).toEqual(today);
    });

    it('has no current lesson before school', () => {
        const result = aggregate(today, [tomorrow], at('2026-10-19', '07:00'));

        expect(result.current).toBeNull();
        expect(result.next).toBe(mathFirst);
        expect(result.nextWakeup).toBe(mathFirst);
        expect(result.day).toEqual(makeDay('2026-10-19', [mathFirst]));
    });

    it('has no current lesson after school', () => {
        const result = aggregate(today, [tomorrow], at('2026-10-19', '12:00'));

        expect(result.current).toBeNull();
        expect(result.next).toBe(englishTomorrow);
    });

    it('treats lesson end as exclusive', () => {
        expect(aggregate(today, [tomorrow], at('2026-10-19', '08:45')).current).toBeNull();
        expect(aggregate(today, [tomorrow], at('2026-10-19', '08:45'), { includeCancelled: true }).current).toBe(
            mathCancelled
        );
    });

    it('never reports a current lesson outside every lesson interval', () => {
        for (const time of ['00:00', '07:59', '09:30', '09:31', '23:59']) {
            expect(aggregate(today, [tomorrow], at('2026-10-19', time), { includeCancelled: true }).current).toBeNull();
        }
    });

    it('wakes up for a lesson starting right now', () => {
        const result = aggregate(today, [tomorrow], at('2026-10-19', '08:00'));

        expect(result.current).toBe(mathFirst);
        expect(result.nextWakeup).toBe(mathFirst);
    });

    it('skips days without eligible lessons', () => {
        const holiday = makeDay('2026-10-20', [
            makeLesson('2026-10-20', '08:00', '08:45', 'Art', { status: 'cancelled' }),
        ]);
        const friday = makeLesson('2026-10-21', '09:00', '09:45', 'Eng');
        const result = aggregate(makeDay('2026-10-19', []), [holiday, makeDay('2026-10-21', [friday])], at('2026-10-19', '10:00'));

        expect(result.next).toBe(friday);
        expect(result.nextWakeup).toBe(friday);
        expect(result.day?.date).toBe('2026-10-21');
    });

    it('returns nothing without lessons', () => {
        expect(aggregate(makeDay('2026-10-19', []), [], at('2026-10-19', '10:00'))).toEqual({
            current: null,
            next: null,
            nextWakeup: null,
            day: null,
            nextDay: null,
        });
    });
});

describe('schoolDayBounds', () => {
    it('spans the eligible lessons of the day', () => {
        const lateCancelled = makeLesson('2026-10-19', '11:00', '11:45', 'Art', { status: 'cancelled' });
        const english = makeLesson('2026-10-19', '10:00', '10:45', 'Eng');
        const day = makeDay('2026-10-19', [mathFirst, mathCancelled, english, lateCancelled]);

        expect(schoolDayBounds(day)).toEqual({ start: at('2026-10-19', '08:00'), end: at('2026-10-19', '10:45') });
        expect(schoolDayBounds(day, { includeCancelled: true })?.end).toEqual(at('2026-10-19', '11:45'));
    });

    it('is null for a day off', () => {
        expect(schoolDayBounds(makeDay('2026-10-19', [mathCancelled]))).toBeNull();
    });
});
