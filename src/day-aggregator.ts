import type { AggregationOptions, AggregationResult, Day, Lesson, SchoolDayBounds } from './types.js';

const DEFAULT_AGGREGATION_OPTIONS: AggregationOptions = { includeCancelled: false };

const isEligible = (lesson: Lesson, options: AggregationOptions): boolean =>
    options.includeCancelled || lesson.status !== 'cancelled';

const eligibleDay = (day: Day, options: AggregationOptions): Day => ({
    date: day.date,
    lessons: day.lessons.filter(lesson => isEligible(lesson, options)),
});

/**
 * Selects the running, next and wake-up lesson relative to `now`.
 *
 * `upcoming` holds the days after `today` in date order; days without
 * eligible lessons are skipped when looking for `next` and `nextWakeup`.
 */
export function aggregate(
    today: Day,
    upcoming: readonly Day[],
    now: Date,
    options: AggregationOptions = DEFAULT_AGGREGATION_OPTIONS
): AggregationResult {
    const at = now.getTime();
    const todayEligible = eligibleDay(today, options);
    const following = upcoming.map(day => eligibleDay(day, options)).filter(day => day.lessons.length > 0);

    const current = todayEligible.lessons.find(
        lesson => lesson.start.getTime() <= at && at < lesson.end.getTime()
    ) ?? null;

    let next: Lesson | null = null;
    let nextDay: Day | null = null;
    const laterToday = todayEligible.lessons.find(lesson => lesson.start.getTime() > at);
    if (laterToday) {
        next = laterToday;
        nextDay = todayEligible;
    } else if (following.length > 0) {
        nextDay = following[0];
        next = nextDay.lessons[0];
    }

    // Today only counts for waking up while its first lesson is still ahead.
    let day: Day | null = null;
    const firstToday = todayEligible.lessons[0];
    if (firstToday && firstToday.start.getTime() >= at) {
        day = todayEligible;
    } else if (following.length > 0) {
        day = following[0];
    }
    const nextWakeup = day ? day.lessons[0] : null;

    return { current, next, nextWakeup, day, nextDay };
}

/**
 * Earliest start and latest end among today's eligible lessons.
 */
export function schoolDayBounds(
    today: Day,
    options: AggregationOptions = DEFAULT_AGGREGATION_OPTIONS
): SchoolDayBounds | null {
    const lessons = eligibleDay(today, options).lessons;
    if (lessons.length === 0) return null;

    let start = lessons[0].start;
    let end = lessons[0].end;
    for (const lesson of lessons) {
        if (lesson.start < start) start = lesson.start;
        if (lesson.end > end) end = lesson.end;
    }
    return { start, end };
}
