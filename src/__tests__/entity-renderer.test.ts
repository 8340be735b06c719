import { describe, expect, it } from 'vitest';
import { aggregate, schoolDayBounds } from '../day-aggregator.js';
import { lessonToJson, render, renderCalendarEvents, toCalendarEvent } from '../entity-renderer.js';
import { at, makeDay, makeLesson, makeRenderOptions, named } from './fixtures.js';

const mathFirst = makeLesson('2026-10-19', '08:00', '08:45', 'Math', { id: 1 });
const mathCancelled = makeLesson('2026-10-19', '08:45', '09:30', 'Math', { id: 2, status: 'cancelled' });
const englishTomorrow = makeLesson('2026-10-20', '08:00', '08:45', 'Eng', { id: 3 });
const today = makeDay('2026-10-19', [mathFirst, mathCancelled]);
const tomorrow = makeDay('2026-10-20', [englishTomorrow]);

const renderAt = (time: string, options = makeRenderOptions()) =>
    render(aggregate(today, [tomorrow], at('2026-10-19', time)), options, {
        calendarLessons: [mathFirst, mathCancelled, englishTomorrow],
        todayBounds: schoolDayBounds(today),
    });

describe('lessonToJson', () => {
    const lesson = makeLesson('2026-10-19', '08:00', '08:45', 'Math', {
        id: 42,
        lsNumber: 5,
        infoText: 'Bring calculator',
    });

    it('uses the WebUntis key names', () => {
        expect(lessonToJson(lesson, makeRenderOptions())).toEqual({
            start: '2026-10-19T08:00:00+00:00',
            end: '2026-10-19T08:45:00+00:00',
            id: 42,
            code: null,
            type: 'Unterricht',
            status: 'regular',
            subjects: [{ name: 'Math', long_name: 'Mathematics' }],
            rooms: [{ name: 'R1', long_name: 'Room 1' }],
            klassen: [{ name: '10A', long_name: '10A' }],
            original_rooms: [],
            teachers: [{ name: 'T1', long_name: 'Teacher One' }],
            original_teachers: [],
        });
    });

    it('adds lesson texts in the extended form', () => {
        expect(lessonToJson(lesson, makeRenderOptions({ extendedTimetable: true }))).toMatchObject({
            lstext: '',
            substText: 'Bring calculator',
            lsnumber: '5',
        });
    });

    it('leaves out teachers when they are excluded', () => {
        const json = lessonToJson(lesson, makeRenderOptions({ excludeData: new Set(['teachers']) }));
        expect(json).not.toHaveProperty('teachers');
        expect(json).not.toHaveProperty('original_teachers');
    });

    it('leaves out the id of lessons without one', () => {
        expect(lessonToJson(mathFirst, makeRenderOptions())).toHaveProperty('id', 1);
        expect(lessonToJson({ ...mathFirst, id: null }, makeRenderOptions())).not.toHaveProperty('id');
    });
});

describe('render', () => {
    it('renders the entities during a lesson', () => {
        const entities = renderAt('08:10');

        expect(entities.class).toEqual({
            key: 'class',
            name: 'Class',
            icon: 'mdi:school-outline',
            deviceClass: null,
            state: true,
            attributes: { lesson: 'Mathematics' },
        });
        expect(entities.nextClass.state).toBe('2026-10-20T08:00:00+00:00');
        expect(entities.nextClass.deviceClass).toBe('timestamp');
        expect(entities.nextClass.attributes).toEqual({});
        expect(entities.nextLessonToWakeUp.name).toBe('Next lesson to wake up');
        expect(entities.nextLessonToWakeUp.state).toBe('2026-10-20T08:00:00+00:00');
        expect(entities.todaySchoolStart.state).toBe('2026-10-19T08:00:00+00:00');
        expect(entities.todaySchoolEnd.state).toBe('2026-10-19T08:45:00+00:00');
    });

    it('publishes timestamps with the zone offset', () => {
        const entities = renderAt('08:10', makeRenderOptions({ timeZone: 'Europe/Berlin' }));
        expect(entities.nextClass.state).toBe('2026-10-20T10:00:00+02:00');
    });

    it('attaches lesson JSON only when enabled', () => {
        const options = makeRenderOptions({ generateJson: true });
        const entities = renderAt('08:10', options);
        const englishJson = lessonToJson(englishTomorrow, options);

        expect(entities.nextClass.attributes).toEqual({ lesson: englishJson, day: [englishJson] });
        expect(entities.nextLessonToWakeUp.attributes).toEqual({ day: [englishJson] });
    });

    it('is idempotent', () => {
        expect(renderAt('08:10')).toEqual(renderAt('08:10'));
    });

    it('renders empty entities without lessons', () => {
        const entities = render(aggregate(makeDay('2026-10-19', []), [], at('2026-10-19', '10:00')), makeRenderOptions());

        expect(entities.class.state).toBe(false);
        expect(entities.class.attributes).toEqual({ lesson: null });
        expect(entities.nextClass.state).toBeNull();
        expect(entities.nextLessonToWakeUp.state).toBeNull();
        expect(entities.todaySchoolStart.state).toBeNull();
        expect(entities.calendar).toEqual([]);
    });
});

describe('renderCalendarEvents', () => {
    const mathDouble = [
        makeLesson('2026-10-19', '08:00', '08:45', 'Math'),
        makeLesson('2026-10-19', '08:45', '09:30', 'Math'),
    ];
    const sportCancelled = makeLesson('2026-10-19', '10:00', '10:45', 'Sport', { status: 'cancelled' });

    it('merges double periods and hides cancelled lessons', () => {
        const events = renderCalendarEvents([...mathDouble, sportCancelled], makeRenderOptions());

        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({
            summary: 'Mathematics',
            start: '2026-10-19T08:00:00+00:00',
            end: '2026-10-19T09:30:00+00:00',
            location: 'Room 1',
            cancelled: false,
        });
        expect(events[0]).not.toHaveProperty('description');
    });

    it('shows cancelled lessons when configured', () => {
        const events = renderCalendarEvents([...mathDouble, sportCancelled], makeRenderOptions({}, { showCancelled: true }));

        expect(events.map(event => event.summary)).toEqual(['Mathematics', 'Cancelled: Physical Education']);
        expect(events[1].cancelled).toBe(true);
    });

    it('uses short subject names when configured', () => {
        expect(renderCalendarEvents(mathDouble, makeRenderOptions({}, { longName: false }))[0].summary).toBe('Math');
    });
});

describe('toCalendarEvent', () => {
    const moved = makeLesson('2026-10-19', '08:00', '08:45', 'Math', {
        rooms: [named('R2', 'Room 2')],
        originalRooms: [named('R1')],
        infoText: 'Bring calculator',
    });

    it('marks room changes when configured', () => {
        expect(toCalendarEvent(moved, makeRenderOptions()).summary).toBe('Mathematics');
        expect(toCalendarEvent(moved, makeRenderOptions({}, { showRoomChange: true })).summary).toBe(
            'Room change: Mathematics'
        );
        expect(
            toCalendarEvent({ ...moved, status: 'cancelled' }, makeRenderOptions({}, { showRoomChange: true })).summary
        ).toBe('Cancelled: Room change: Mathematics');
    });

    it('falls back to the lesson text for lessons without a subject', () => {
        expect(toCalendarEvent({ ...moved, subjects: [], lessonText: 'Project week' }, makeRenderOptions()).summary).toBe(
            'Project week'
        );
        expect(toCalendarEvent({ ...moved, subjects: [] }, makeRenderOptions()).summary).toBe('Lesson');
    });

    it('fills the description by mode', () => {
        const asJson = toCalendarEvent(moved, makeRenderOptions({}, { descriptionMode: 'json' }));
        expect(JSON.parse(asJson.description ?? '{}')).toMatchObject({
            subjects: [{ name: 'Math', long_name: 'Mathematics' }],
            original_rooms: [{ name: 'R1', long_name: 'R1' }],
        });

        expect(toCalendarEvent(moved, makeRenderOptions({}, { descriptionMode: 'lesson_info' })).description).toBe(
            'Bring calculator'
        );
        expect(toCalendarEvent(moved, makeRenderOptions()).description).toBeUndefined();
    });

    it('fills the location by mode', () => {
        const location = (room: 'long' | 'short' | 'short-long' | 'none') =>
            toCalendarEvent(moved, makeRenderOptions({}, { room })).location;

        expect(location('long')).toBe('Room 2');
        expect(location('short')).toBe('R2');
        expect(location('short-long')).toBe('R2 - Room 2');
        expect(location('none')).toBeUndefined();
    });

    it('derives a stable uid', () => {
        const options = makeRenderOptions();
        expect(toCalendarEvent(moved, options).uid).toBe(toCalendarEvent({ ...moved }, options).uid);
        expect(toCalendarEvent(moved, options).uid).not.toBe(toCalendarEvent(mathFirst, options).uid);
    });
});
