import { z } from 'zod';
import { zonedTimeToInstant } from './time-zone.js';
import type { Lesson, LessonStatus, NamedEntity } from './types.js';

// Per-school fields vary a lot, so only time and status are strict.
const elementSchema = z.object({
    id: z.number().optional(),
    name: z.string().optional(),
    longname: z.string().optional(),
    orgid: z.number().optional(),
    orgname: z.string().optional(),
});

type RawElement = z.infer<typeof elementSchema>;

const elementList = z.array(elementSchema).catch([]);
const optionalText = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

const untisDate = z
    .number()
    .int()
    .refine(value => untisDateToKey(value) !== null, 'invalid YYYYMMDD date');

const untisTime = z
    .number()
    .int()
    .min(0)
    .max(2359)
    .refine(value => value % 100 < 60, 'invalid HHMM time');

const untisPeriodSchema = z
    .object({
        id: optionalNumber,
        date: untisDate,
        startTime: untisTime,
        endTime: untisTime,
        kl: elementList,
        te: elementList,
        su: elementList,
        ro: elementList,
        lsnumber: optionalNumber,
        code: z.string().nullish(),
        activityType: optionalText,
        substText: optionalText,
        lstext: optionalText,
    })
    .refine(period => period.endTime > period.startTime, 'lesson ends before it starts');

type UntisPeriod = z.infer<typeof untisPeriodSchema>;

export interface ParseOptions {
    timeZone: string;
    teacherNames?: ReadonlyMap<number, string>;
}

export interface ParseResult {
    lessons: Lesson[];
    skipped: number;
}

export function untisDateToKey(value: number): string | null {
    const year = Math.floor(value / 10000);
    const month = Math.floor(value / 100) % 100;
    const day = value % 100;
    const date = new Date(Date.UTC(year, month - 1, day));
    if (year < 1900 || date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

const toEntity = (element: RawElement): NamedEntity => {
    const name = element.name ?? '';
    return {
        id: element.id ?? null,
        name,
        longName: element.longname || name,
    };
};

const toOriginal = (elements: RawElement[]): NamedEntity[] =>
    elements
        .filter(element => element.orgname !== undefined)
        .map(element => ({
            id: element.orgid ?? null,
            name: element.orgname ?? '',
            longName: element.orgname ?? '',
        }));

function resolveStatus(period: UntisPeriod): LessonStatus {
    if (period.code === 'cancelled') return 'cancelled';
    if (period.code === 'irregular') return 'irregular';
    const replaced = [...period.su, ...period.te, ...period.ro].some(
        element => element.orgid !== undefined || element.orgname !== undefined
    );
    return replaced ? 'substituted' : 'regular';
}

function periodToLesson(period: UntisPeriod, options: ParseOptions): Lesson {
    const date = untisDateToKey(period.date) ?? '';
    const at = (time: number) => zonedTimeToInstant(date, Math.floor(time / 100), time % 100, options.timeZone);

    const teachers = period.te.map(element => {
        const entity = toEntity(element);
        const fullName = entity.id !== null ? options.teacherNames?.get(entity.id) : undefined;
        return fullName ? { ...entity, longName: fullName } : entity;
    });

    return {
        id: period.id ?? null,
        lsNumber: period.lsnumber ?? null,
        date,
        start: at(period.startTime),
        end: at(period.endTime),
        subjects: period.su.map(toEntity),
        rooms: period.ro.map(toEntity),
        originalRooms: toOriginal(period.ro),
        teachers,
        originalTeachers: toOriginal(period.te),
        classes: period.kl.map(toEntity),
        status: resolveStatus(period),
        code: period.code ?? null,
        activityType: period.activityType ?? null,
        infoText: period.substText ?? null,
        lessonText: period.lstext ?? null,
    };
}

/**
 * Converts raw timetable records into lessons. Records with unusable
 * time or status fields are skipped and counted instead of failing the batch.
 */
export function parseLessons(raw: readonly unknown[], options: ParseOptions): ParseResult {
    const lessons: Lesson[] = [];
    let skipped = 0;

    for (const record of raw) {
        const parsed = untisPeriodSchema.safeParse(record);
        if (!parsed.success) {
            skipped++;
            continue;
        }
        lessons.push(periodToLesson(parsed.data, options));
    }

    return { lessons, skipped };
}
