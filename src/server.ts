import http from 'http';
import { z } from 'zod';
import { AppError, classifyError } from './errors.js';
import { FeedGenerator } from './feed-generator.js';
import { errorMessage } from './helpers.js';
import { untisDateToKey } from './lesson-parser.js';
import { Store } from './store.js';
import { TimetableCoordinator } from './timetable-coordinator.js';

export interface ServerDeps {
    store: Store;
    coordinator: TimetableCoordinator;
    feeds: FeedGenerator;
}

export interface HttpResponse {
    status: number;
    contentType: string;
    body: string;
}

const isoDate = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .refine(value => untisDateToKey(Number(value.replace(/-/g, ''))) === value, 'invalid date');

const flag = (fallback: boolean) =>
    z
        .enum(['true', 'false'])
        .optional()
        .transform(value => (value === undefined ? fallback : value === 'true'));

const range = { start: isoDate, end: isoDate };
const ordered = (value: { start: string; end: string }) => value.start <= value.end;
const ORDER_MESSAGE = { message: 'start must not be after end' };

const rangeSchema = z.object(range).refine(ordered, ORDER_MESSAGE);

const lessonsSchema = z
    .object({
        ...range,
        filter: flag(true),
        show_cancelled: flag(true),
        compact: flag(true),
    })
    .refine(ordered, ORDER_MESSAGE);

const countSchema = z
    .object({
        ...range,
        filter: flag(true),
        count_cancelled: flag(false),
    })
    .refine(ordered, ORDER_MESSAGE);

const json = (status: number, payload: unknown): HttpResponse => ({
    status,
    contentType: 'application/json',
    body: JSON.stringify(payload),
});

const NO_DATA = { error: 'No data yet. Please wait for the first fetch.' };

function parseQuery<S extends z.ZodTypeAny>(schema: S, params: URLSearchParams): z.infer<S> {
    const parsed = schema.safeParse(Object.fromEntries(params));
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`);
        throw new AppError(`Invalid query - ${detail.join('; ')}`, 400, 'INVALID_QUERY');
    }
    return parsed.data;
}

function errorResponse(e: unknown): HttpResponse {
    let status = 502;
    let code: string | undefined = 'UNTIS_UNAVAILABLE';
    if (e instanceof AppError) {
        status = e.status;
        code = e.code;
    } else if (classifyError(e) === 'bad-credentials') {
        status = 401;
        code = 'BAD_CREDENTIALS';
    }
    if (status >= 500) {
        console.error('[server] request failed', { status, message: errorMessage(e), code });
    }
    return json(status, { error: errorMessage(e), code });
}

export async function handleRequest(rawUrl: string, deps: ServerDeps): Promise<HttpResponse> {
    const url = new URL(rawUrl, 'http://localhost');
    const snapshot = deps.store.getSnapshot();

    try {
        switch (url.pathname) {
            case '/health':
                return { status: 200, contentType: 'text/plain', body: 'OK' };

            case '/api/entities':
                if (!snapshot) return json(503, NO_DATA);
                return json(200, { updatedAt: snapshot.updatedAt.toISOString(), ...snapshot.entities });

            case '/calendar.xml':
            case '/calendar.json': {
                if (!snapshot) return json(503, NO_DATA);
                const feed = deps.feeds.calendarFeed(snapshot.entities.calendar, snapshot.updatedAt);
                return url.pathname === '/calendar.xml'
                    ? { status: 200, contentType: 'application/rss+xml', body: feed.rss2() }
                    : { status: 200, contentType: 'application/feed+json', body: feed.json1() };
            }

            case '/feed.xml': {
                const feed = deps.feeds.changeFeed(deps.store.getHistory(), snapshot?.updatedAt ?? new Date());
                return { status: 200, contentType: 'application/rss+xml', body: feed.rss2() };
            }

            case '/api/calendar': {
                const { start, end } = parseQuery(rangeSchema, url.searchParams);
                return json(200, await deps.coordinator.calendarEvents(start, end));
            }

            case '/api/lessons': {
                const query = parseQuery(lessonsSchema, url.searchParams);
                const lessons = await deps.coordinator.timetableJson(query.start, query.end, {
                    filter: query.filter,
                    includeCancelled: query.show_cancelled,
                    compact: query.compact,
                });
                return json(200, lessons);
            }

            case '/api/lessons/count': {
                const query = parseQuery(countSchema, url.searchParams);
                const counts = await deps.coordinator.countLessons(query.start, query.end, {
                    filter: query.filter,
                    includeCancelled: query.count_cancelled,
                });
                return json(200, counts);
            }

            default:
                return { status: 404, contentType: 'text/plain', body: 'Not Found' };
        }
    } catch (e) {
        return errorResponse(e);
    }
}

export const startServer = (port: number, deps: ServerDeps): http.Server => {
    const server = http.createServer((req, res) => {
        handleRequest(req.url ?? '/', deps)
            .then(response => {
                res.writeHead(response.status, { 'Content-Type': response.contentType });
                res.end(response.body);
            })
            .catch(e => {
                console.error('[server] unexpected error', e);
                res.writeHead(500);
                res.end('Internal Server Error');
            });
    });

    server.listen(port, () => {
        console.log(`Server started at http://localhost:${port}/api/entities`);
    });
    return server;
};
