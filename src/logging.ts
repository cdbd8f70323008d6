import fs from 'fs/promises';
import path from 'path';
import { formatDate } from './calendar.ts';
import type { EventBus } from './events.ts';
import type { BusEvent, CalendarDate, LogEntry } from './types.ts';

export class Logger {
  constructor(private readonly dir: string) {}

  private async ensureDir(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  async log(entry: LogEntry): Promise<void> {
    await this.ensureDir();
    const textLine = Logger.formatText(entry) + '\n';
    const jsonLine = JSON.stringify(Logger.formatJson(entry)) + '\n';

    await Promise.all([
      fs.appendFile(path.join(this.dir, 'events.log'), textLine, 'utf8'),
      fs.appendFile(path.join(this.dir, 'events.jsonl'), jsonLine, 'utf8'),
    ]);

    // Also surface to console for live viewing.
    process.stdout.write(textLine);
  }

  static formatText(entry: LogEntry): string {
    const ts = entry.realTime.toISOString();
    const details = entry.details ? ` — ${entry.details}` : '';
    return `${ts} [${entry.category}] (${formatDate(entry.date)}) ${entry.summary}${details}`;
  }

  static formatJson(entry: LogEntry) {
    return {
      ...entry,
      realTime: entry.realTime.toISOString(),
    };
  }
}

function toLogEntry(event: BusEvent, today: CalendarDate): Omit<LogEntry, 'realTime'> {
  switch (event.kind) {
    case 'season-changed':
      return { category: 'season', summary: `The season turns to ${event.to}`, details: `was ${event.from}`, date: today };
    case 'day-advanced':
      return { category: 'calendar', summary: 'A new day begins', date: event.date };
    case 'event-started':
      return {
        category: 'event',
        summary: `Event started: ${event.event.displayName}`,
        details: event.event.durationDays === -1 ? 'runs until ended' : `${event.event.durationDays} days`,
        date: event.date,
      };
    case 'event-ended':
      return { category: 'event', summary: `Event ended: ${event.event.displayName}`, date: event.date };
  }
}

/**
 * Records every calendar notification in the event log. Returns the
 * unsubscribe function so a reload can detach from the old bus.
 */
export function attachLogger(bus: EventBus, logger: Logger, today: () => CalendarDate): () => void {
  return bus.subscribeAll((event) => logger.log({ ...toLogEntry(event, today()), realTime: new Date() }));
}
