import { describe, expect, it } from 'vitest';
import { parseLessons, untisDateToKey } from '../lesson-parser.js';

const rawPeriod = (extra: Record<string, unknown> = {}) => ({
    id: 42,
    date: 20261019,
    startTime: 800,
    endTime: 845,
    kl: [{ id: 1, name: '10A', longname: 'Class 10A' }],
    te: [{ id: 7, name: 'MUS', longname: 'Mustermann' }],
    su: [{ id: 3, name: 'MA', longname: 'Mathematics' }],
    ro: [{ id: 9, name: 'R101', longname: 'Room 101' }],
    lsnumber: 5,
    activityType: 'Unterricht',
    ...extra,
});

describe('untisDateToKey', () => {
    it('formats valid dates', () => {
        expect(untisDateToKey(20240229)).toBe('2024-02-29');
        expect(untisDateToKey(20261019)).toBe('2026-10-19');
    });

    it('rejects impossible dates', () => {
        expect(untisDateToKey(20230229)).toBeNull();
        expect(untisDateToKey(20261350)).toBeNull();
    });
});

describe('parseLessons', () => {
    it('converts local school times with the configured zone', () => {
        const { lessons, skipped } = parseLessons([rawPeriod({ substText: 'Bring calculator' })], {
            timeZone: 'Europe/Berlin',
        });

        expect(skipped).toBe(0);
        expect(lessons).toHaveLength(1);
        const [lesson] = lessons;
        expect(lesson.date).toBe('2026-10-19');
        expect(lesson.start.toISOString()).toBe('2026-10-19T06:00:00.000Z');
        expect(lesson.end.toISOString()).toBe('2026-10-19T06:45:00.000Z');
        expect(lesson.id).toBe(42);
        expect(lesson.lsNumber).toBe(5);
        expect(lesson.status).toBe('regular');
        expect(lesson.code).toBeNull();
        expect(lesson.subjects).toEqual([{ id: 3, name: 'MA', longName: 'Mathematics' }]);
        expect(lesson.rooms).toEqual([{ id: 9, name: 'R101', longName: 'Room 101' }]);
        expect(lesson.classes).toEqual([{ id: 1, name: '10A', longName: 'Class 10A' }]);
        expect(lesson.infoText).toBe('Bring calculator');
        expect(lesson.lessonText).toBeNull();
    });

    it('falls back to the short name when the long name is missing', () => {
        const { lessons } = parseLessons([rawPeriod({ su: [{ id: 3, name: 'MA' }] })], { timeZone: 'UTC' });
        expect(lessons[0].subjects).toEqual([{ id: 3, name: 'MA', longName: 'MA' }]);
    });

    it('resolves the lesson status', () => {
        const { lessons } = parseLessons(
            [
                rawPeriod({ code: 'cancelled' }),
                rawPeriod({ code: 'irregular' }),
                rawPeriod({ te: [{ id: 8, name: 'SUB', longname: 'Substitute', orgid: 7, orgname: 'MUS' }] }),
                rawPeriod({ code: null }),
            ],
            { timeZone: 'UTC' }
        );

        expect(lessons.map(lesson => lesson.status)).toEqual(['cancelled', 'irregular', 'substituted', 'regular']);
        expect(lessons[0].code).toBe('cancelled');
        expect(lessons[2].originalTeachers).toEqual([{ id: 7, name: 'MUS', longName: 'MUS' }]);
        expect(lessons[2].teachers).toEqual([{ id: 8, name: 'SUB', longName: 'Substitute' }]);
    });

    it('records the original room of a room change', () => {
        const { lessons } = parseLessons(
            [rawPeriod({ ro: [{ id: 10, name: 'R102', longname: 'Room 102', orgname: 'R101' }] })],
            { timeZone: 'UTC' }
        );
        expect(lessons[0].originalRooms).toEqual([{ id: null, name: 'R101', longName: 'R101' }]);
        expect(lessons[0].status).toBe('substituted');
    });

    it('replaces teacher long names with full names when known', () => {
        const { lessons } = parseLessons([rawPeriod()], {
            timeZone: 'UTC',
            teacherNames: new Map([[7, 'Max Mustermann']]),
        });
        expect(lessons[0].teachers).toEqual([{ id: 7, name: 'MUS', longName: 'Max Mustermann' }]);
    });

    it('skips malformed records without failing the batch', () => {
        const { lessons, skipped } = parseLessons(
            [
                rawPeriod(),
                'garbage',
                null,
                rawPeriod({ startTime: undefined }),
                rawPeriod({ date: 20261350 }),
                rawPeriod({ startTime: 900, endTime: 845 }),
                rawPeriod({ endTime: 875 }),
                rawPeriod({ code: 5 }),
            ],
            { timeZone: 'UTC' }
        );

        expect(lessons).toHaveLength(1);
        expect(skipped).toBe(7);
    });

    it('keeps records whose element lists are malformed', () => {
        const { lessons, skipped } = parseLessons([rawPeriod({ su: 'MA', ro: undefined })], { timeZone: 'UTC' });
        expect(skipped).toBe(0);
        expect(lessons[0].subjects).toEqual([]);
        expect(lessons[0].rooms).toEqual([]);
    });
});
