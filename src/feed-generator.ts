import { Feed } from 'feed';
import type { CalendarEvent, FeedItem } from './types.js';

export class FeedGenerator {
    private baseUrl: string;

    constructor(baseUrl: string) {
        this.baseUrl = baseUrl;
    }

    private createFeed(path: string, title: string, description: string, updated: Date): Feed {
        return new Feed({
            title,
            description,
            id: `${this.baseUrl}/${path}`,
            link: `${this.baseUrl}/${path}`,
            language: 'en',
            updated,
            generator: 'untis-entities',
            copyright: '',
        });
    }

    /**
     * Timetable change notifications, newest first.
     */
    changeFeed(history: FeedItem[], updated: Date): Feed {
        const feed = this.createFeed('feed.xml', 'WebUntis Timetable Changes', 'Cancellations, room changes and substitutions.', updated);
        const items = [...history].sort((a, b) => new Date(b.date).getTime() - new Date(a.date).getTime());

        for (const item of items) {
            feed.addItem({
                title: item.title,
                id: item.id,
                link: item.link,
                description: item.description,
                date: new Date(item.date),
            });
        }
        return feed;
    }

    /**
     * Calendar events as feed items dated by lesson start.
     */
    calendarFeed(events: CalendarEvent[], updated: Date): Feed {
        const feed = this.createFeed('calendar.xml', 'WebUntis Calendar', 'Upcoming lessons.', updated);

        for (const event of events) {
            const details = [`${event.start} - ${event.end}`];
            if (event.location) details.push(`Room: ${event.location}`);
            feed.addItem({
                title: event.summary,
                id: event.uid,
                link: '',
                description: details.join(' | '),
                content: event.description,
                date: new Date(event.start),
            });
        }
        return feed;
    }
}
