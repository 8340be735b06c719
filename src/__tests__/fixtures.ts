import type { CalendarOptions, Day, Lesson, NamedEntity, RenderOptions } from '../types.js';

const LONG_NAMES: Record<string, string> = {
    Math: 'Mathematics',
    Sport: 'Physical Education',
    Eng: 'English',
    Art: 'Fine Arts',
};

export const named = (name: string, longName: string = name, id: number | null = null): NamedEntity => ({
    id,
    name,
    longName,
});

/** UTC instant for a date and HH:MM. */
export const at = (date: string, time: string): Date => new Date(`${date}T${time}:00Z`);

export function makeLesson(
    date: string,
    from: string,
    to: string,
    subject: string,
    overrides: Partial<Lesson> = {}
): Lesson {
    return {
        id: null,
        lsNumber: null,
        date,
        start: at(date, from),
        end: at(date, to),
        subjects: [named(subject, LONG_NAMES[subject] ?? subject)],
        rooms: [named('R1', 'Room 1')],
        originalRooms: [],
        teachers: [named('T1', 'Teacher One')],
        originalTeachers: [],
        classes: [named('10A')],
        status: 'regular',
        code: null,
        activityType: 'Unterricht',
        infoText: null,
        lessonText: null,
        ...overrides,
    };
}

export const makeDay = (date: string, lessons: Lesson[]): Day => ({ date, lessons });

export function makeRenderOptions(
    overrides: Partial<RenderOptions> = {},
    calendar: Partial<CalendarOptions> = {}
): RenderOptions {
    return {
        timeZone: 'UTC',
        generateJson: false,
        extendedTimetable: false,
        excludeData: new Set(),
        ...overrides,
        calendar: {
            longName: true,
            showCancelled: false,
            showRoomChange: false,
            descriptionMode: 'none',
            room: 'long',
            ...calendar,
        },
    };
}
