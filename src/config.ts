import { config as loadEnv } from 'dotenv';
import { splitList } from './helpers.js';
import { isValidTimeZone } from './time-zone.js';
import type {
    AggregationOptions,
    CalendarDescriptionMode,
    CalendarRoomMode,
    DataCategory,
    DedupPolicy,
    FilterMode,
    FilterRule,
    NotifyOption,
    RenderOptions,
    TimetableSource,
} from './types.js';

loadEnv();

const TIMETABLE_SOURCES = ['personal', 'class', 'subject', 'room', 'teacher'] as const;
const FILTER_MODES = ['none', 'allow', 'block'] as const;
const DESCRIPTION_MODES = ['json', 'lesson_info', 'none'] as const;
const ROOM_MODES = ['long', 'short', 'short-long', 'none'] as const;
const DEDUP_POLICIES = ['status', 'last-write'] as const;
const DATA_CATEGORIES = ['teachers'] as const;
const NOTIFY_OPTIONS = ['cancelled', 'rooms', 'lesson change', 'code'] as const;

export class Config {
    public readonly updateInterval: number;
    public readonly port: number;
    public readonly baseUrl: string;
    public readonly mock: boolean;

    public readonly untisSchool: string;
    public readonly untisUser: string;
    public readonly untisSecret: string;
    public readonly untisServer: string;
    public readonly timetableSource: TimetableSource;
    public readonly sourceName: string;
    public readonly keepLoggedIn: boolean;

    public readonly timeZone: string;
    public readonly daysToFuture: number;
    public readonly dedupPolicy: DedupPolicy;
    public readonly filterMode: FilterMode;
    public readonly filterSubjects: string[];
    public readonly filterDescription: string[];
    public readonly includeCancelled: boolean;

    public readonly calendarLongName: boolean;
    public readonly calendarShowCancelledLessons: boolean;
    public readonly calendarShowRoomChange: boolean;
    public readonly calendarDescriptionMode: CalendarDescriptionMode;
    public readonly calendarRoom: CalendarRoomMode;
    public readonly generateJson: boolean;
    public readonly extendedTimetable: boolean;
    public readonly excludeData: DataCategory[];
    public readonly notifyOptions: NotifyOption[];

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        this.mock = this.getFlag('UNTIS_MOCK', false);
        this.updateInterval = this.getNumber('UPDATE_INTERVAL', 300) * 1000;
        this.port = this.getNumber('PORT', 6565);

        const rawBaseUrl = env.BASE_URL || `http://localhost:${this.port}`;
        this.baseUrl = rawBaseUrl.endsWith('/') ? rawBaseUrl.slice(0, -1) : rawBaseUrl;

        this.untisSchool = this.getCredential('UNTIS_SCHOOL');
        this.untisUser = this.getCredential('UNTIS_USER');
        this.untisSecret = this.getCredential('UNTIS_PASSWORD');
        this.untisServer = this.getCredential('UNTIS_SERVER');
        this.timetableSource = this.getChoice('TIMETABLE_SOURCE', TIMETABLE_SOURCES, 'personal');
        this.sourceName = this.timetableSource === 'personal' ? '' : this.getEnv('SOURCE_NAME');
        this.keepLoggedIn = this.getFlag('KEEP_LOGGED_IN', false);

        this.timeZone = env.TIMEZONE || Intl.DateTimeFormat().resolvedOptions().timeZone;
        if (!isValidTimeZone(this.timeZone)) {
            throw new Error(`Invalid time zone in TIMEZONE: ${this.timeZone}`);
        }
        this.daysToFuture = this.getNumber('DAYS_TO_FUTURE', 30);
        this.dedupPolicy = this.getChoice('DEDUP_POLICY', DEDUP_POLICIES, 'status');
        this.filterMode = this.getChoice('FILTER_MODE', FILTER_MODES, 'none');
        this.filterSubjects = splitList(env.FILTER_SUBJECTS);
        this.filterDescription = splitList(env.FILTER_DESCRIPTION);
        this.includeCancelled = this.getFlag('SENSOR_INCLUDE_CANCELLED', false);

        this.calendarLongName = this.getFlag('CALENDAR_LONG_NAME', true);
        this.calendarShowCancelledLessons = this.getFlag('CALENDAR_SHOW_CANCELLED_LESSONS', false);
        this.calendarShowRoomChange = this.getFlag('CALENDAR_SHOW_ROOM_CHANGE', false);
        this.calendarDescriptionMode = this.getChoice('CALENDAR_DESCRIPTION_MODE', DESCRIPTION_MODES, 'json');
        this.calendarRoom = this.getChoice('CALENDAR_ROOM', ROOM_MODES, 'long');
        this.generateJson = this.getFlag('GENERATE_JSON', false);
        this.extendedTimetable = this.getFlag('EXTENDED_TIMETABLE', false);
        this.excludeData = this.getChoiceList('EXCLUDE_DATA', DATA_CATEGORIES);
        this.notifyOptions = this.getChoiceList('NOTIFY_OPTIONS', NOTIFY_OPTIONS);
    }

    get filterRule(): FilterRule {
        return {
            mode: this.filterMode,
            subjects: new Set(this.filterSubjects),
            descriptionSubstrings: new Set(this.filterDescription),
        };
    }

    get aggregationOptions(): AggregationOptions {
        return { includeCancelled: this.includeCancelled };
    }

    get renderOptions(): RenderOptions {
        return {
            timeZone: this.timeZone,
            generateJson: this.generateJson,
            extendedTimetable: this.extendedTimetable,
            excludeData: new Set(this.excludeData),
            calendar: {
                longName: this.calendarLongName,
                showCancelled: this.calendarShowCancelledLessons,
                showRoomChange: this.calendarShowRoomChange,
                descriptionMode: this.calendarDescriptionMode,
                room: this.calendarRoom,
            },
        };
    }

    private getEnv(key: string): string {
        const val = this.env[key];
        if (!val) {
            throw new Error(`Missing required environment variable: ${key}`);
        }
        return val;
    }

    // The mock client needs no real account.
    private getCredential(key: string): string {
        return this.mock ? this.env[key] || 'mock' : this.getEnv(key);
    }

    private getFlag(key: string, fallback: boolean): boolean {
        const val = this.env[key];
        if (val === undefined || val === '') return fallback;
        return ['true', '1', 'yes'].includes(val.toLowerCase());
    }

    private getNumber(key: string, fallback: number): number {
        const val = this.env[key];
        if (!val) return fallback;
        const parsed = Number(val);
        if (!Number.isFinite(parsed) || parsed <= 0) {
            throw new Error(`Invalid number in ${key}: ${val}`);
        }
        return parsed;
    }

    private getChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
        const val = this.env[key];
        if (!val) return fallback;
        const choice = choices.find(candidate => candidate === val.trim().toLowerCase());
        if (!choice) {
            throw new Error(`Invalid value for ${key}: ${val} (expected one of ${choices.join(', ')})`);
        }
        return choice;
    }

    private getChoiceList<T extends string>(key: string, choices: readonly T[]): T[] {
        return splitList(this.env[key]).map(item => {
            const choice = choices.find(candidate => candidate === item.toLowerCase());
            if (!choice) {
                throw new Error(`Invalid value in ${key}: ${item} (expected any of ${choices.join(', ')})`);
            }
            return choice;
        });
    }
}
