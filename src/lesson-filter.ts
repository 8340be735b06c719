import type { FilterRule, Lesson } from './types.js';

export const NO_FILTER: FilterRule = {
    mode: 'none',
    subjects: new Set(),
    descriptionSubstrings: new Set(),
};

const matchesSubject = (lesson: Lesson, subjects: ReadonlySet<string>): boolean =>
    lesson.subjects.some(subject => subject.name !== '' && subjects.has(subject.name));

const matchesDescription = (lesson: Lesson, substrings: ReadonlySet<string>): boolean => {
    const texts = [lesson.infoText, lesson.lessonText]
        .filter((text): text is string => !!text)
        .map(text => text.toLowerCase());
    if (texts.length === 0) return false;
    for (const substring of substrings) {
        const needle = substring.toLowerCase();
        if (needle && texts.some(text => text.includes(needle))) return true;
    }
    return false;
};

/**
 * Whether a lesson passes the configured subject and description rules.
 * Lessons without a subject never pass.
 */
export function passesFilter(lesson: Lesson, rule: FilterRule): boolean {
    if (lesson.subjects.length === 0) return false;
    if (matchesDescription(lesson, rule.descriptionSubstrings)) return false;

    if (rule.mode === 'block' && matchesSubject(lesson, rule.subjects)) return false;
    // An empty allow list means "no restriction".
    if (rule.mode === 'allow' && rule.subjects.size > 0 && !matchesSubject(lesson, rule.subjects)) return false;

    return true;
}

export function filterLessons(lessons: readonly Lesson[], rule: FilterRule): Lesson[] {
    return lessons.filter(lesson => passesFilter(lesson, rule));
}
