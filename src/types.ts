export type LessonStatus = 'regular' | 'cancelled' | 'substituted' | 'irregular';

export interface NamedEntity {
    id: number | null;
    name: string;
    longName: string;
}

export interface Lesson {
    id: number | null;
    lsNumber: number | null;
    date: string; // YYYY-MM-DD in the configured time zone
    start: Date;
    end: Date;
    subjects: NamedEntity[];
    rooms: NamedEntity[];
    originalRooms: NamedEntity[];
    teachers: NamedEntity[];
    originalTeachers: NamedEntity[];
    classes: NamedEntity[];
    status: LessonStatus;
    code: string | null;
    activityType: string | null;
    infoText: string | null; // substText
    lessonText: string | null; // lstext
}

export interface Day {
    date: string;
    lessons: Lesson[];
}

export type FilterMode = 'none' | 'allow' | 'block';

export interface FilterRule {
    mode: FilterMode;
    subjects: ReadonlySet<string>;
    descriptionSubstrings: ReadonlySet<string>;
}

export type DedupPolicy = 'status' | 'last-write';

export interface AggregationOptions {
    includeCancelled: boolean;
}

export interface AggregationResult {
    current: Lesson | null;
    next: Lesson | null;
    nextWakeup: Lesson | null;
    day: Day | null; // wake-up day, eligible lessons only
    nextDay: Day | null; // next lesson's day, eligible lessons only
}

export interface SchoolDayBounds {
    start: Date;
    end: Date;
}

// --- Rendering ---

export type DataCategory = 'teachers';

export type CalendarDescriptionMode = 'json' | 'lesson_info' | 'none';

export type CalendarRoomMode = 'long' | 'short' | 'short-long' | 'none';

export interface CalendarOptions {
    longName: boolean;
    showCancelled: boolean;
    showRoomChange: boolean;
    descriptionMode: CalendarDescriptionMode;
    room: CalendarRoomMode;
}

export interface RenderOptions {
    timeZone: string;
    generateJson: boolean;
    extendedTimetable: boolean;
    excludeData: ReadonlySet<DataCategory>;
    calendar: CalendarOptions;
}

export interface NamedJson {
    name: string;
    long_name: string;
}

export interface LessonJson {
    start: string;
    end: string;
    id?: number;
    code: string | null;
    type: string | null;
    status: LessonStatus;
    subjects: NamedJson[];
    lstext?: string;
    substText?: string;
    lsnumber?: string;
    rooms: NamedJson[];
    klassen: NamedJson[];
    original_rooms: NamedJson[];
    teachers?: NamedJson[];
    original_teachers?: NamedJson[];
}

export interface EntityState<T> {
    key: string;
    name: string;
    icon: string;
    deviceClass: string | null;
    state: T | null;
    attributes: Record<string, unknown>;
}

export interface CalendarEvent {
    uid: string;
    summary: string;
    start: string;
    end: string;
    description?: string;
    location?: string;
    cancelled: boolean;
}

export interface RenderedEntities {
    class: EntityState<boolean>;
    nextClass: EntityState<string>;
    nextLessonToWakeUp: EntityState<string>;
    todaySchoolStart: EntityState<string>;
    todaySchoolEnd: EntityState<string>;
    calendar: CalendarEvent[];
}

// --- Poll cycle state ---

export interface TimetableSnapshot {
    updatedAt: Date;
    lessons: Lesson[];
    result: AggregationResult;
    entities: RenderedEntities;
}

export type NotifyOption = 'cancelled' | 'rooms' | 'lesson change' | 'code';

export interface Change {
    type: 'added' | 'removed' | 'updated';
    old?: Lesson;
    new?: Lesson;
}

export interface Notification {
    kind: NotifyOption;
    title: string;
    description: string;
    lesson: Lesson;
}

export interface FeedItem {
    title: string;
    id: string;
    link: string;
    description: string;
    date: string; // ISO string
}

// --- WebUntis API Interfaces ---

export interface SchoolYear {
    id: number;
    name: string;
    startDate: Date;
    endDate: Date;
}

export interface UntisElement {
    id: number;
    name: string;
    longName: string;
}

export type TimetableSource = 'personal' | 'class' | 'subject' | 'room' | 'teacher';
