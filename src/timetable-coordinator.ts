import { detectNotifications, lessonKey } from './change-detector.js';
import { aggregate, schoolDayBounds } from './day-aggregator.js';
import { lessonToJson, render, renderCalendarEvents } from './entity-renderer.js';
import { classifyError } from './errors.js';
import { errorMessage, generateHash } from './helpers.js';
import { filterLessons } from './lesson-filter.js';
import { parseLessons } from './lesson-parser.js';
import { Store } from './store.js';
import { addDays, dateKey, zonedTimeToInstant } from './time-zone.js';
import { compactLessons, findDay, groupByDay, normalize } from './timetable-normalizer.js';
import { UntisManager } from './untis-manager.js';
import type {
    AggregationOptions,
    CalendarEvent,
    DataCategory,
    DedupPolicy,
    FilterRule,
    Lesson,
    LessonJson,
    NotifyOption,
    RenderOptions,
    SchoolYear,
    TimetableSnapshot,
} from './types.js';

const HISTORY_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

export interface CoordinatorOptions {
    label: string; // user@school, for log lines
    timeZone: string;
    daysToFuture: number;
    dedupPolicy: DedupPolicy;
    filterRule: FilterRule;
    aggregation: AggregationOptions;
    render: RenderOptions;
    notifyOptions: ReadonlySet<NotifyOption>;
}

export interface RangeQuery {
    filter: boolean;
    includeCancelled: boolean;
}

export class TimetableCoordinator {
    private store: Store;
    private untisManager: UntisManager;
    private options: CoordinatorOptions;
    private excludeData: Set<DataCategory>;
    private lastStatusRequestFailed = false;
    private updating = false;

    constructor(store: Store, untisManager: UntisManager, options: CoordinatorOptions) {
        this.store = store;
        this.untisManager = untisManager;
        this.options = options;
        this.excludeData = new Set(options.render.excludeData);
    }

    get excludedData(): ReadonlySet<DataCategory> {
        return this.excludeData;
    }

    private get renderOptions(): RenderOptions {
        return { ...this.options.render, excludeData: new Set(this.excludeData) };
    }

    /**
     * Runs one poll-and-render cycle. Never throws: on failure the previous
     * snapshot stays in the store. Resolves to whether new data was stored.
     */
    async update(now: Date = new Date()): Promise<boolean> {
        if (this.updating) {
            console.debug('[coordinator] Previous update still running, skipping');
            return false;
        }
        this.updating = true;
        try {
            return await this.runCycle(now);
        } finally {
            this.updating = false;
        }
    }

    private async runCycle(now: Date): Promise<boolean> {
        console.log(`[${now.toISOString()}] Refreshing WebUntis data...`);

        try {
            await this.untisManager.acquire();
        } catch (e) {
            this.reportLoginFailure(e);
            return false;
        }

        try {
            const schoolYear = await this.activeSchoolYear(now);
            if (schoolYear === null) {
                if (!this.lastStatusRequestFailed) {
                    console.info(`[coordinator] No active schoolyear for '${this.options.label}'`);
                }
                this.lastStatusRequestFailed = true;
                this.store.setSnapshot(this.buildSnapshot([], now));
                return true;
            }

            const today = dateKey(now, this.options.timeZone);
            let end = this.noonOf(addDays(today, this.options.daysToFuture));
            if (schoolYear && schoolYear.endDate < end) {
                end = schoolYear.endDate;
            }

            const lessons = await this.loadLessons(this.noonOf(today), end, { filter: true, includeCancelled: true });
            const snapshot = this.buildSnapshot(lessons, now);
            this.recordChanges(snapshot, now);
            this.store.setSnapshot(snapshot);

            if (this.lastStatusRequestFailed) {
                console.info(`[coordinator] WebUntis '${this.options.label}' is available again`);
            }
            this.lastStatusRequestFailed = false;
            console.debug(`[coordinator] Stored ${lessons.length} lessons`);
            return true;
        } catch (e) {
            console.warn(
                `[coordinator] Updating the timetable of '${this.options.label}' failed - ${errorMessage(e)}. Keeping previous data.`
            );
            return false;
        } finally {
            await this.releaseSession();
        }
    }

    private reportLoginFailure(e: unknown): void {
        if (!this.lastStatusRequestFailed) {
            if (classifyError(e) === 'bad-credentials') {
                console.error(`[coordinator] Login to WebUntis '${this.options.label}' failed - bad credentials`);
            } else {
                console.warn(`[coordinator] Login to WebUntis '${this.options.label}' failed - ${errorMessage(e)}`);
            }
        }
        this.lastStatusRequestFailed = true;
    }

    private async releaseSession(): Promise<void> {
        try {
            await this.untisManager.release();
        } catch (e) {
            console.warn(`[coordinator] Logout from WebUntis failed - ${errorMessage(e)}`);
        }
    }

    private noonOf(date: string): Date {
        return zonedTimeToInstant(date, 12, 0, this.options.timeZone);
    }

    /**
     * The school year containing `now`, null when there is none, undefined
     * when the school years could not be requested.
     */
    private async activeSchoolYear(now: Date): Promise<SchoolYear | null | undefined> {
        try {
            const years = await this.untisManager.getSchoolYears();
            const dayAfter = (year: SchoolYear) => year.endDate.getTime() + 24 * 60 * 60 * 1000;
            return years.find(year => year.startDate <= now && now.getTime() < dayAfter(year)) ?? null;
        } catch (e) {
            console.warn(`[coordinator] Request for schoolyears of '${this.options.label}' failed - ${errorMessage(e)}`);
            return undefined;
        }
    }

    private async teacherNames(): Promise<Map<number, string> | undefined> {
        if (this.excludeData.has('teachers')) return undefined;
        try {
            return await this.untisManager.getTeacherNames();
        } catch (e) {
            if (classifyError(e) === 'not-authorized') {
                this.excludeData.add('teachers');
                console.info(`[coordinator] No rights for getTeachers() for '${this.options.label}', teachers are now excluded`);
            } else {
                console.warn(`[coordinator] Request for teachers of '${this.options.label}' failed - ${errorMessage(e)}`);
            }
            return undefined;
        }
    }

    private async loadLessons(start: Date, end: Date, query: RangeQuery): Promise<Lesson[]> {
        const teacherNames = await this.teacherNames();
        const raw = await this.untisManager.getTimetable(start, end);

        const { lessons, skipped } = parseLessons(raw, { timeZone: this.options.timeZone, teacherNames });
        if (skipped > 0) {
            console.warn(`[coordinator] Skipped ${skipped} malformed timetable records`);
        }

        const filtered = query.filter ? filterLessons(lessons, this.options.filterRule) : lessons;
        const visible = query.includeCancelled ? filtered : filtered.filter(lesson => lesson.status !== 'cancelled');
        return normalize(visible, this.options.dedupPolicy);
    }

    buildSnapshot(lessons: Lesson[], now: Date): TimetableSnapshot {
        const { timeZone, aggregation } = this.options;
        const todayKey = dateKey(now, timeZone);
        const days = groupByDay(lessons, timeZone);
        const today = findDay(days, todayKey);
        const upcoming = days.filter(day => day.date > todayKey);

        const result = aggregate(today, upcoming, now, aggregation);
        const entities = render(result, this.renderOptions, {
            calendarLessons: lessons,
            todayBounds: schoolDayBounds(today, aggregation),
        });

        return { updatedAt: now, lessons, result, entities };
    }

    private recordChanges(snapshot: TimetableSnapshot, now: Date): void {
        if (this.options.notifyOptions.size === 0) return;

        const previous = this.store.getSnapshot();
        if (!previous || previous.lessons.length === 0) {
            console.log('[coordinator] First timetable snapshot, changes are tracked from now on.');
            return;
        }

        const notifications = detectNotifications(
            previous.lessons,
            snapshot.lessons,
            { today: dateKey(now, this.options.timeZone), timeZone: this.options.timeZone },
            this.options.notifyOptions
        );

        for (const notification of notifications) {
            this.store.addToHistory({
                title: notification.title,
                id: generateHash({ kind: notification.kind, key: lessonKey(notification.lesson), lesson: notification.lesson }),
                link: '',
                description: notification.description,
                date: now.toISOString(),
            });
        }
        if (notifications.length > 0) {
            console.debug(`[coordinator] Timetable has changed: ${notifications.length} notifications`);
        }
        this.store.pruneHistory(HISTORY_MAX_AGE_MS, now);
    }

    // --- on-demand range queries ---

    private async withSession<T>(work: () => Promise<T>): Promise<T> {
        await this.untisManager.acquire();
        try {
            return await work();
        } finally {
            await this.releaseSession();
        }
    }

    async lessonsInRange(start: string, end: string, query: RangeQuery): Promise<Lesson[]> {
        return await this.withSession(() => this.loadLessons(this.noonOf(start), this.noonOf(end), query));
    }

    async timetableJson(start: string, end: string, query: RangeQuery & { compact: boolean }): Promise<LessonJson[]> {
        const lessons = await this.lessonsInRange(start, end, query);
        const options = this.renderOptions;
        return (query.compact ? compactLessons(lessons) : lessons).map(lesson => lessonToJson(lesson, options));
    }

    async calendarEvents(start: string, end: string): Promise<CalendarEvent[]> {
        const lessons = await this.lessonsInRange(start, end, { filter: true, includeCancelled: true });
        return renderCalendarEvents(lessons, this.renderOptions);
    }

    /**
     * Lessons per subject long name, most frequent first.
     */
    async countLessons(start: string, end: string, query: RangeQuery): Promise<Record<string, number>> {
        const lessons = await this.lessonsInRange(start, end, query);
        const counts = new Map<string, number>();
        for (const lesson of lessons) {
            const subject = lesson.subjects[0];
            if (!subject) continue;
            counts.set(subject.longName, (counts.get(subject.longName) ?? 0) + 1);
        }
        return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]));
    }
}
