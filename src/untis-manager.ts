import { WebUntis, WebUntisElementType } from 'webuntis';
import { z } from 'zod';
import { AppError } from './errors.js';
import type { SchoolYear, TimetableSource, UntisElement } from './types.js';

export interface UntisConnection {
    school: string;
    username: string;
    password: string;
    server: string;
    timetableSource: TimetableSource;
    sourceName: string;
    keepLoggedIn: boolean;
}

export type ElementSource = Exclude<TimetableSource, 'personal'>;

const ELEMENT_TYPES = {
    class: WebUntisElementType.CLASS,
    teacher: WebUntisElementType.TEACHER,
    subject: WebUntisElementType.SUBJECT,
    room: WebUntisElementType.ROOM,
} as const;

export interface TimetableElement {
    id: number;
    type: (typeof ELEMENT_TYPES)[ElementSource];
}

const schoolYearList = z.array(
    z.object({
        id: z.number(),
        name: z.string(),
        startDate: z.coerce.date(),
        endDate: z.coerce.date(),
    })
);

const elementList = z.array(
    z.object({
        id: z.number(),
        name: z.string(),
        longName: z.string().optional(),
        foreName: z.string().optional(),
    })
);

export class UntisManager {
    private untis: WebUntis;
    private loggedIn = false;
    private activeSessions = 0;
    private sessionQueue: Promise<void> = Promise.resolve();
    private sourceElement: TimetableElement | null = null;

    constructor(protected readonly connection: UntisConnection) {
        this.untis = new WebUntis(
            connection.school,
            connection.username,
            connection.password,
            connection.server,
            'UntisEntities/1.0'
        );
    }

    // --- raw client calls, overridden by the mock ---

    protected async login(): Promise<void> {
        await this.untis.login();
    }

    protected async logout(): Promise<void> {
        await this.untis.logout();
    }

    protected async validateSession(): Promise<boolean> {
        return await this.untis.validateSession();
    }

    protected async fetchSchoolYears(): Promise<unknown> {
        return await this.untis.getSchoolyears();
    }

    protected async fetchElements(source: ElementSource): Promise<unknown> {
        switch (source) {
            case 'class':
                return await this.untis.getClasses();
            case 'subject':
                return await this.untis.getSubjects();
            case 'room':
                return await this.untis.getRooms();
            case 'teacher':
                return await this.untis.getTeachers();
        }
    }

    protected async fetchTimetable(start: Date, end: Date, element: TimetableElement | null): Promise<unknown[]> {
        if (element === null) {
            return await this.untis.getOwnTimetableForRange(start, end);
        }
        return await this.untis.getTimetableForRange(start, end, element.id, element.type);
    }

    // --- session lifecycle ---

    get isLoggedIn(): boolean {
        return this.loggedIn;
    }

    /**
     * Runs session changes one after another, so a login never overlaps a
     * pending logout.
     */
    private exclusive(work: () => Promise<void>): Promise<void> {
        const run = this.sessionQueue.then(work);
        // Failures reach the caller through `run`; the queue only keeps order.
        this.sessionQueue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    /**
     * Makes sure a session exists for one unit of work. Sessions are shared
     * between overlapping callers and reused across cycles with keepLoggedIn.
     */
    async acquire(): Promise<void> {
        await this.exclusive(async () => {
            if (this.loggedIn && !(await this.validateSession())) {
                console.debug('[untis] Session invalid, logging in again');
                this.loggedIn = false;
            }
            if (!this.loggedIn) {
                await this.login();
                this.loggedIn = true;
            }
            this.activeSessions++;
        });
    }

    async release(): Promise<void> {
        await this.exclusive(async () => {
            this.activeSessions = Math.max(0, this.activeSessions - 1);
            if (this.connection.keepLoggedIn || this.activeSessions > 0 || !this.loggedIn) {
                return;
            }
            this.loggedIn = false;
            await this.logout();
        });
    }

    // --- data ---

    async getSchoolYears(): Promise<SchoolYear[]> {
        return schoolYearList.parse(await this.fetchSchoolYears());
    }

    /**
     * Full teacher names by id; throws when the account has no right to list teachers.
     */
    async getTeacherNames(): Promise<Map<number, string>> {
        const teachers = elementList.parse(await this.fetchElements('teacher'));
        const names = new Map<number, string>();
        for (const teacher of teachers) {
            const fullName = [teacher.foreName, teacher.longName].filter(Boolean).join(' ');
            names.set(teacher.id, fullName || teacher.name);
        }
        return names;
    }

    async getElements(source: ElementSource): Promise<UntisElement[]> {
        return elementList.parse(await this.fetchElements(source)).map(element => ({
            id: element.id,
            name: element.name,
            longName: element.longName ?? element.name,
        }));
    }

    private async resolveSourceElement(): Promise<TimetableElement | null> {
        const { timetableSource, sourceName } = this.connection;
        if (timetableSource === 'personal') return null;
        if (this.sourceElement) return this.sourceElement;

        const wanted = sourceName.toLowerCase();
        const match = (await this.getElements(timetableSource)).find(
            element => element.name.toLowerCase() === wanted || element.longName.toLowerCase() === wanted
        );
        if (!match) {
            throw new AppError(`Unknown ${timetableSource} '${sourceName}'`, 404, 'UNKNOWN_SOURCE');
        }
        this.sourceElement = { id: match.id, type: ELEMENT_TYPES[timetableSource] };
        return this.sourceElement;
    }

    async getTimetable(start: Date, end: Date): Promise<unknown[]> {
        const element = await this.resolveSourceElement();
        return await this.fetchTimetable(start, end, element);
    }
}
