import { generateHash } from './helpers.js';
import { formatZoned } from './time-zone.js';
import { compactLessons } from './timetable-normalizer.js';
import type {
    AggregationResult,
    CalendarEvent,
    Day,
    EntityState,
    Lesson,
    LessonJson,
    NamedEntity,
    NamedJson,
    RenderedEntities,
    RenderOptions,
    SchoolDayBounds,
} from './types.js';

export const ENTITY_NAMES = {
    class: 'Class',
    nextClass: 'Next Class',
    nextLessonToWakeUp: 'Next lesson to wake up',
    todaySchoolStart: 'Today school start',
    todaySchoolEnd: 'Today school end',
} as const;

const ICONS = {
    class: 'mdi:school-outline',
    nextClass: 'mdi:table-clock',
    nextLessonToWakeUp: 'mdi:clock-start',
    todaySchoolStart: 'mdi:calendar-start',
    todaySchoolEnd: 'mdi:calendar-end',
} as const;

export interface RenderExtras {
    calendarLessons?: readonly Lesson[];
    todayBounds?: SchoolDayBounds | null;
}

const toJsonList = (entities: NamedEntity[]): NamedJson[] =>
    entities.map(entity => ({ name: entity.name, long_name: entity.longName }));

/**
 * Structured form of a lesson, as published in entity attributes and
 * calendar descriptions. Keys mirror the WebUntis payload names.
 */
export function lessonToJson(lesson: Lesson, options: RenderOptions): LessonJson {
    const json: LessonJson = {
        start: formatZoned(lesson.start, options.timeZone),
        end: formatZoned(lesson.end, options.timeZone),
        code: lesson.code,
        type: lesson.activityType,
        status: lesson.status,
        subjects: toJsonList(lesson.subjects),
        rooms: toJsonList(lesson.rooms),
        klassen: toJsonList(lesson.classes),
        original_rooms: toJsonList(lesson.originalRooms),
    };

    if (lesson.id !== null) json.id = lesson.id;

    if (options.extendedTimetable) {
        json.lstext = lesson.lessonText ?? '';
        json.substText = lesson.infoText ?? '';
        json.lsnumber = lesson.lsNumber !== null ? String(lesson.lsNumber) : '';
    }

    if (!options.excludeData.has('teachers')) {
        json.teachers = toJsonList(lesson.teachers);
        json.original_teachers = toJsonList(lesson.originalTeachers);
    }

    return json;
}

const dayToJson = (day: Day | null, options: RenderOptions): LessonJson[] =>
    day ? day.lessons.map(lesson => lessonToJson(lesson, options)) : [];

function lessonTitle(lesson: Lesson, options: RenderOptions): string {
    const subject = lesson.subjects[0];
    const name = subject ? (options.calendar.longName ? subject.longName : subject.name) : '';
    const base = name || lesson.lessonText || 'Lesson';

    let prefix = '';
    if (options.calendar.showRoomChange && lesson.originalRooms.length > 0) {
        prefix = 'Room change: ';
    }
    const summary = prefix + base;
    return lesson.status === 'cancelled' ? `Cancelled: ${summary}` : summary;
}

function lessonLocation(lesson: Lesson, options: RenderOptions): string | undefined {
    const room = lesson.rooms[0];
    if (!room) return undefined;
    switch (options.calendar.room) {
        case 'long':
            return room.longName;
        case 'short':
            return room.name;
        case 'short-long':
            return `${room.name} - ${room.longName}`;
        case 'none':
            return undefined;
    }
}

function lessonDescription(lesson: Lesson, options: RenderOptions): string | undefined {
    switch (options.calendar.descriptionMode) {
        case 'json':
            return JSON.stringify(lessonToJson(lesson, options));
        case 'lesson_info':
            return lesson.infoText ?? undefined;
        case 'none':
            return undefined;
    }
}

export function toCalendarEvent(lesson: Lesson, options: RenderOptions): CalendarEvent {
    const start = formatZoned(lesson.start, options.timeZone);
    const end = formatZoned(lesson.end, options.timeZone);
    const event: CalendarEvent = {
        uid: generateHash({ id: lesson.id, start, end, subjects: lesson.subjects.map(s => s.name) }),
        summary: lessonTitle(lesson, options),
        start,
        end,
        cancelled: lesson.status === 'cancelled',
    };

    const description = lessonDescription(lesson, options);
    if (description !== undefined) event.description = description;
    const location = lessonLocation(lesson, options);
    if (location !== undefined) event.location = location;

    return event;
}

/**
 * One event per lesson after merging double periods. Cancelled lessons
 * only appear when the calendar is configured to show them.
 */
export function renderCalendarEvents(lessons: readonly Lesson[], options: RenderOptions): CalendarEvent[] {
    return compactLessons(lessons)
        .filter(lesson => options.calendar.showCancelled || lesson.status !== 'cancelled')
        .map(lesson => toCalendarEvent(lesson, options));
}

function entity<T>(
    key: keyof typeof ENTITY_NAMES,
    deviceClass: string | null,
    state: T | null,
    attributes: Record<string, unknown> = {}
): EntityState<T> {
    return { key, name: ENTITY_NAMES[key], icon: ICONS[key], deviceClass, state, attributes };
}

const timestamp = (instant: Date | undefined, options: RenderOptions): string | null =>
    instant ? formatZoned(instant, options.timeZone) : null;

export function render(
    result: AggregationResult,
    options: RenderOptions,
    extras: RenderExtras = {}
): RenderedEntities {
    const nextAttributes: Record<string, unknown> = {};
    const wakeUpAttributes: Record<string, unknown> = {};

    if (options.generateJson) {
        if (result.next) {
            nextAttributes.lesson = lessonToJson(result.next, options);
            nextAttributes.day = dayToJson(result.nextDay, options);
        }
        if (result.nextWakeup) {
            wakeUpAttributes.day = dayToJson(result.day, options);
        }
    }

    return {
        class: entity('class', null, result.current !== null, {
            lesson: result.current ? lessonTitle(result.current, options) : null,
        }),
        nextClass: entity('nextClass', 'timestamp', timestamp(result.next?.start, options), nextAttributes),
        nextLessonToWakeUp: entity(
            'nextLessonToWakeUp',
            'timestamp',
            timestamp(result.nextWakeup?.start, options),
            wakeUpAttributes
        ),
        todaySchoolStart: entity('todaySchoolStart', 'timestamp', timestamp(extras.todayBounds?.start, options)),
        todaySchoolEnd: entity('todaySchoolEnd', 'timestamp', timestamp(extras.todayBounds?.end, options)),
        calendar: renderCalendarEvents(extras.calendarLessons ?? [], options),
    };
}
