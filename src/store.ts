import type { FeedItem, TimetableSnapshot } from './types.js';

/**
 * Process-scoped state: the last snapshot that rendered successfully and the
 * change history. Starts empty and is only replaced wholesale.
 */
export class Store {
    private snapshot: TimetableSnapshot | null = null;
    private history: FeedItem[] = [];

    getSnapshot(): TimetableSnapshot | null {
        return this.snapshot;
    }

    setSnapshot(snapshot: TimetableSnapshot): void {
        this.snapshot = snapshot;
    }

    addToHistory(item: FeedItem): void {
        if (this.history.some(existing => existing.id === item.id)) return;
        this.history.push(item);
    }

    getHistory(): FeedItem[] {
        return [...this.history];
    }

    pruneHistory(maxAgeMs: number, now: Date = new Date()): void {
        const cutoff = now.getTime() - maxAgeMs;
        this.history = this.history.filter(item => new Date(item.date).getTime() > cutoff);
    }
}
