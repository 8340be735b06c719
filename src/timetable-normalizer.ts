import { dateKey } from './time-zone.js';
import type { Day, DedupPolicy, Lesson, LessonStatus, NamedEntity } from './types.js';

// Higher rank wins under the 'status' policy.
const STATUS_RANK: Record<LessonStatus, number> = {
    regular: 0,
    irregular: 1,
    cancelled: 2,
    substituted: 3,
};

const subjectKey = (lesson: Lesson): string => lesson.subjects.map(subject => subject.name).join(',');

const firstSubjectName = (lesson: Lesson): string => lesson.subjects[0]?.name ?? '';

const dedupKey = (lesson: Lesson): string =>
    `${lesson.start.getTime()}|${lesson.end.getTime()}|${subjectKey(lesson)}`;

function prefer(existing: Lesson, candidate: Lesson, policy: DedupPolicy): Lesson {
    if (policy === 'last-write') return candidate;
    return STATUS_RANK[candidate.status] >= STATUS_RANK[existing.status] ? candidate : existing;
}

export function compareLessons(a: Lesson, b: Lesson): number {
    const byStart = a.start.getTime() - b.start.getTime();
    if (byStart !== 0) return byStart;
    const nameA = firstSubjectName(a);
    const nameB = firstSubjectName(b);
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
}

/**
 * Deduplicates lessons sharing start, end and subjects, then sorts them
 * by start time (ties by subject short name).
 */
export function normalize(raw: readonly Lesson[], policy: DedupPolicy = 'status'): Lesson[] {
    const unique = new Map<string, Lesson>();

    for (const lesson of raw) {
        const key = dedupKey(lesson);
        const existing = unique.get(key);
        unique.set(key, existing ? prefer(existing, lesson, policy) : lesson);
    }

    return [...unique.values()].sort(compareLessons);
}

/**
 * Groups sorted lessons by their calendar date in the given zone.
 */
export function groupByDay(lessons: readonly Lesson[], timeZone: string): Day[] {
    const days = new Map<string, Lesson[]>();

    for (const lesson of lessons) {
        const key = dateKey(lesson.start, timeZone);
        const bucket = days.get(key);
        if (bucket) {
            bucket.push(lesson);
        } else {
            days.set(key, [lesson]);
        }
    }

    return [...days.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([date, dayLessons]) => ({ date, lessons: [...dayLessons].sort(compareLessons) }));
}

export function findDay(days: readonly Day[], date: string): Day {
    return days.find(day => day.date === date) ?? { date, lessons: [] };
}

const sameEntities = (a: NamedEntity[], b: NamedEntity[]): boolean =>
    a.length === b.length && a.every((entity, i) => entity.name === b[i].name && entity.longName === b[i].longName);

const isContinuation = (previous: Lesson, next: Lesson): boolean =>
    previous.end.getTime() === next.start.getTime() &&
    previous.status === next.status &&
    previous.date === next.date &&
    sameEntities(previous.subjects, next.subjects) &&
    sameEntities(previous.rooms, next.rooms) &&
    sameEntities(previous.teachers, next.teachers);

/**
 * Merges back-to-back lessons of the same subject, room, teacher and status
 * (double periods) into one lesson spanning both. Expects sorted input.
 */
export function compactLessons(lessons: readonly Lesson[]): Lesson[] {
    const compacted: Lesson[] = [];

    for (const lesson of lessons) {
        const last = compacted[compacted.length - 1];
        if (last && isContinuation(last, lesson)) {
            compacted[compacted.length - 1] = { ...last, end: lesson.end };
        } else {
            compacted.push(lesson);
        }
    }

    return compacted;
}
