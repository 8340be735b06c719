import { UntisManager, type ElementSource, type TimetableElement, type UntisConnection } from './untis-manager.js';

const toUntisDate = (date: Date): number =>
    date.getFullYear() * 10000 + (date.getMonth() + 1) * 100 + date.getDate();

const CLASS_10A = { id: 1, name: '10A', longname: '10A' };

/**
 * Offline stand-in for WebUntis. Each logout ends a cycle and moves the
 * scenario forward so change tracking has something to report.
 */
export class MockUntisManager extends UntisManager {
    private counter = 0;

    constructor(connection: UntisConnection) {
        super(connection);
        console.log('⚠️ STARTED IN MOCK MODE ⚠️');
    }

    protected async login(): Promise<void> {
        console.log('[Mock] Login successful');
    }

    protected async logout(): Promise<void> {
        console.log('[Mock] Logout successful (Cycle complete)');
        this.counter++;
    }

    protected async validateSession(): Promise<boolean> {
        return true;
    }

    protected async fetchSchoolYears(): Promise<unknown> {
        const now = new Date();
        return [{
            id: 1,
            name: `${now.getFullYear()}`,
            startDate: new Date(now.getFullYear(), 0, 1),
            endDate: new Date(now.getFullYear(), 11, 31),
        }];
    }

    protected async fetchElements(source: ElementSource): Promise<unknown> {
        switch (source) {
            case 'teacher':
                return [
                    { id: 1, name: 'MUS', foreName: 'Max', longName: 'Mustermann' },
                    { id: 2, name: 'TES', foreName: 'Tina', longName: 'Tester' },
                ];
            case 'class':
                return [{ id: 1, name: '10A', longName: 'Class 10A' }];
            case 'subject':
                return [
                    { id: 1, name: 'MATH', longName: 'Mathematics' },
                    { id: 2, name: 'ENG', longName: 'English' },
                ];
            case 'room':
                return [{ id: 1, name: 'R101', longName: 'Room 101' }];
        }
    }

    protected async fetchTimetable(start: Date, end: Date, element: TimetableElement | null): Promise<unknown[]> {
        console.debug(`[Mock] Timetable requested${element ? ` for element ${element.id}` : ''}`);
        const periods: unknown[] = [];
        const day = new Date(start.getFullYear(), start.getMonth(), start.getDate());
        let id = 1000;

        for (let i = 0; i < 2 && day <= end; i++) {
            const date = toUntisDate(day);
            periods.push({
                id: id++,
                date,
                startTime: 800,
                endTime: 845,
                kl: [CLASS_10A],
                te: [{ id: 1, name: 'MUS', longname: 'Mustermann' }],
                su: [{ id: 1, name: 'MATH', longname: 'Mathematics' }],
                ro: [{ id: 1, name: 'R101', longname: 'Room 101' }],
                lsnumber: 1,
                // Cycle 1+: the first Math lesson is cancelled
                ...(i === 0 && this.counter >= 1 ? { code: 'cancelled' } : {}),
            });
            periods.push({
                id: id++,
                date,
                startTime: 845,
                endTime: 930,
                kl: [CLASS_10A],
                te: [{ id: 1, name: 'MUS', longname: 'Mustermann' }],
                su: [{ id: 1, name: 'MATH', longname: 'Mathematics' }],
                ro: [{ id: 1, name: 'R101', longname: 'Room 101' }],
                lsnumber: 1,
            });
            day.setDate(day.getDate() + 1);
        }

        // Cycle 2+: an extra English lesson on the first day
        if (this.counter >= 2) {
            periods.push({
                id: 1999,
                date: toUntisDate(start),
                startTime: 1000,
                endTime: 1045,
                kl: [CLASS_10A],
                te: [{ id: 2, name: 'TES', longname: 'Tester' }],
                su: [{ id: 2, name: 'ENG', longname: 'English' }],
                ro: [{ id: 2, name: 'R102', longname: 'Room 102', orgid: 1, orgname: 'R101' }],
                lsnumber: 2,
                code: 'irregular',
                lstext: 'Extra Lesson',
            });
        }

        return periods;
    }
}
