import { generateHash } from './helpers.js';
import { zonedParts } from './time-zone.js';
import type { Change, Lesson, NamedEntity, Notification, NotifyOption } from './types.js';

export interface ChangeWindow {
    today: string; // YYYY-MM-DD
    timeZone: string;
}

const names = (entities: NamedEntity[]): string => entities.map(entity => entity.longName).join(', ');

const sameList = (a: NamedEntity[], b: NamedEntity[]): boolean =>
    generateHash(a.map(entity => entity.name)) === generateHash(b.map(entity => entity.name));

export const lessonKey = (lesson: Lesson): string =>
    lesson.id !== null
        ? `id:${lesson.id}`
        : `${lesson.start.toISOString()}|${lesson.subjects.map(subject => subject.name).join(',')}`;

const shortNames = (entities: NamedEntity[]): string[] => entities.map(entity => entity.name);

/**
 * Fields whose change is worth a notification. Teachers count by short name
 * only, since full names depend on whether the teacher list could be read.
 */
const notifyFields = (lesson: Lesson) => ({
    id: lesson.id,
    lsNumber: lesson.lsNumber,
    start: lesson.start,
    end: lesson.end,
    status: lesson.status,
    code: lesson.code,
    activityType: lesson.activityType,
    subjects: lesson.subjects,
    rooms: lesson.rooms,
    originalRooms: lesson.originalRooms,
    teachers: shortNames(lesson.teachers),
    originalTeachers: shortNames(lesson.originalTeachers),
});

export function diffLessons(oldLessons: readonly Lesson[], newLessons: readonly Lesson[]): Change[] {
    const oldIndex = new Map(oldLessons.map(lesson => [lessonKey(lesson), lesson]));
    const newIndex = new Map(newLessons.map(lesson => [lessonKey(lesson), lesson]));
    const allKeys = new Set([...oldIndex.keys(), ...newIndex.keys()]);
    const changes: Change[] = [];

    for (const key of allKeys) {
        const oldEntry = oldIndex.get(key);
        const newEntry = newIndex.get(key);

        if (!oldEntry && newEntry) {
            changes.push({ type: 'added', new: newEntry });
        } else if (!newEntry && oldEntry) {
            changes.push({ type: 'removed', old: oldEntry });
        } else if (
            oldEntry &&
            newEntry &&
            generateHash(notifyFields(oldEntry)) !== generateHash(notifyFields(newEntry))
        ) {
            changes.push({ type: 'updated', old: oldEntry, new: newEntry });
        }
    }
    return changes;
}

function formatDate(date: string): string {
    const [y, m, d] = date.split('-');
    return `${d}/${m}/${y}`;
}

function formatTime(instant: Date, timeZone: string): string {
    const p = zonedParts(instant, timeZone);
    return `${String(p.hour).padStart(2, '0')}:${String(p.minute).padStart(2, '0')}`;
}

function describeUpdate(oldEntry: Lesson, newEntry: Lesson, timeZone: string): Notification {
    const subjects = names(newEntry.subjects);
    const at = formatTime(newEntry.start, timeZone);
    const date = formatDate(newEntry.date);

    if (newEntry.status === 'cancelled' && oldEntry.status !== 'cancelled') {
        return {
            kind: 'cancelled',
            title: `❌ Lesson Cancelled: ${subjects}`,
            description: `The lesson ${subjects} at ${at} on ${date} has been cancelled.`,
            lesson: newEntry,
        };
    }
    if (!sameList(oldEntry.rooms, newEntry.rooms)) {
        return {
            kind: 'rooms',
            title: `🚪 Room Change: ${subjects}`,
            description: `For ${subjects} at ${at} on ${date}: Room: ${names(oldEntry.rooms)} ➔ ${names(newEntry.rooms)}`,
            lesson: newEntry,
        };
    }
    if (newEntry.code !== oldEntry.code) {
        return {
            kind: 'code',
            title: `🗓️ Event Update: ${newEntry.lessonText || subjects}`,
            description: `The lesson at ${at} on ${date} is now ${newEntry.code ?? 'regular'}.`,
            lesson: newEntry,
        };
    }
    if (newEntry.originalTeachers.length > 0 && oldEntry.originalTeachers.length === 0) {
        return {
            kind: 'lesson change',
            title: `🔄 Substitution: ${subjects}`,
            description: `For ${subjects} at ${at}, ${names(newEntry.teachers)} is substituting for ${names(newEntry.originalTeachers)}.`,
            lesson: newEntry,
        };
    }

    const diffs: string[] = [];
    if (!sameList(oldEntry.teachers, newEntry.teachers)) {
        diffs.push(`Teacher: ${names(oldEntry.teachers)} ➔ ${names(newEntry.teachers)}`);
    }
    if (!sameList(oldEntry.subjects, newEntry.subjects)) {
        diffs.push(`Subject: ${names(oldEntry.subjects)} ➔ ${subjects}`);
    }
    if (oldEntry.start.getTime() !== newEntry.start.getTime() || oldEntry.end.getTime() !== newEntry.end.getTime()) {
        diffs.push(
            `Time: ${formatTime(oldEntry.start, timeZone)}-${formatTime(oldEntry.end, timeZone)} ➔ ` +
            `${at}-${formatTime(newEntry.end, timeZone)}`
        );
    }

    let description = `A lesson at ${at} has been updated.`;
    if (diffs.length > 0) {
        description += ` Changes: ${diffs.join(' | ')}`;
    }
    return { kind: 'lesson change', title: `Lesson Updated: ${subjects} on ${date}`, description, lesson: newEntry };
}

/**
 * Turns a change into a notification, or null when the change only reflects
 * the fetch window sliding forward.
 */
export function describeChange(change: Change, window: ChangeWindow, oldMaxDate: string): Notification | null {
    if (change.type === 'removed' && change.old) {
        if (change.old.date < window.today) return null;
        const subjects = names(change.old.subjects);
        return {
            kind: 'lesson change',
            title: `Lesson Removed: ${subjects} on ${formatDate(change.old.date)}`,
            description: `A lesson has been removed at ${formatTime(change.old.start, window.timeZone)}.`,
            lesson: change.old,
        };
    }

    if (change.type === 'added' && change.new) {
        if (oldMaxDate && change.new.date > oldMaxDate) return null;
        const entry = change.new;
        const date = formatDate(entry.date);
        const from = formatTime(entry.start, window.timeZone);
        if (entry.status === 'irregular') {
            return {
                kind: 'code',
                title: `🗓️ Event: ${entry.lessonText || 'Irregular Event'}`,
                description: `An event has been added on ${date} from ${from} to ${formatTime(entry.end, window.timeZone)}.`,
                lesson: entry,
            };
        }
        return {
            kind: 'lesson change',
            title: `New Lesson: ${names(entry.subjects)} on ${date}`,
            description: `A new lesson has been added at ${from}.`,
            lesson: entry,
        };
    }

    if (change.type === 'updated' && change.old && change.new) {
        return describeUpdate(change.old, change.new, window.timeZone);
    }
    return null;
}

/**
 * Notifications for every change between two snapshots whose kind is enabled.
 */
export function detectNotifications(
    oldLessons: readonly Lesson[],
    newLessons: readonly Lesson[],
    window: ChangeWindow,
    enabled: ReadonlySet<NotifyOption>
): Notification[] {
    let oldMaxDate = '';
    for (const lesson of oldLessons) {
        if (lesson.date > oldMaxDate) oldMaxDate = lesson.date;
    }

    const notifications: Notification[] = [];
    for (const change of diffLessons(oldLessons, newLessons)) {
        const notification = describeChange(change, window, oldMaxDate);
        if (notification && enabled.has(notification.kind)) {
            notifications.push(notification);
        }
    }
    return notifications;
}
