/**
 * CALENDAR COMMAND
 *
 * Operator surface: /calendar help | set | reload | event. Every reply is a
 * message-table line; input errors are answered and change nothing.
 */

import { formatDate } from './calendar.ts';
import type { CalendarApp, CalendarSystems } from './app.ts';
import type { DateField } from './types.ts';

export interface CommandSender {
  name: string;
  isOperator: boolean;
}

const SUBCOMMANDS = ['help', 'set', 'reload', 'event'] as const;
const OPERATOR_SUBCOMMANDS: ReadonlySet<string> = new Set(['set', 'reload', 'event']);
const DATE_FIELDS: readonly DateField[] = ['day', 'month', 'year'];
const EVENT_ACTIONS = ['start', 'end', 'status'] as const;

function isDateField(value: string): value is DateField {
  return (DATE_FIELDS as readonly string[]).includes(value);
}

// Largest value a date field accepts from a command
const MAX_WHOLE_NUMBER = 2_147_483_647;

function parseWholeNumber(raw: string): number | null {
  if (!/^-?\d+$/.test(raw)) return null;
  const value = Number(raw);
  return Math.abs(value) <= MAX_WHOLE_NUMBER ? value : null;
}

export class CalendarCommand {
  constructor(private readonly app: CalendarApp) {}

  async execute(sender: CommandSender, args: readonly string[]): Promise<string[]> {
    const systems = this.app.systems;
    if (!systems) {
      return ['The calendar is not running.'];
    }
    const { messages } = systems;
    const subcommand = (args[0] ?? 'help').toLowerCase();

    if (subcommand === 'help') {
      return [
        messages.get('commands.help-header'),
        messages.get('commands.help-set'),
        messages.get('commands.help-reload'),
        messages.get('commands.help-event'),
      ];
    }

    if (!OPERATOR_SUBCOMMANDS.has(subcommand)) {
      return [messages.get('commands.invalid-subcommand')];
    }
    if (!sender.isOperator) {
      return [messages.get('commands.no-permission')];
    }

    if (subcommand === 'set') {
      return [this.handleSet(systems, args.slice(1))];
    }
    if (subcommand === 'reload') {
      const reloaded = await this.app.reload();
      const replies = (this.app.systems ?? systems).messages;
      return [replies.get(reloaded ? 'commands.reload-success' : 'commands.reload-failed')];
    }
    return [this.handleEvent(systems, args.slice(1))];
  }

  /** Tab completion; only operators are offered anything past the first word. */
  complete(sender: CommandSender, args: readonly string[]): string[] {
    const prefix = (args[args.length - 1] ?? '').toLowerCase();
    const matching = (options: readonly string[]) => options.filter((option) => option.startsWith(prefix));

    if (args.length <= 1) {
      return sender.isOperator ? matching(SUBCOMMANDS) : matching(['help']);
    }
    if (!sender.isOperator || args.length > 3) return [];

    const subcommand = args[0].toLowerCase();
    if (args.length === 2) {
      if (subcommand === 'set') return matching(DATE_FIELDS);
      if (subcommand === 'event') return matching(EVENT_ACTIONS);
      return [];
    }
    if (subcommand === 'event' && args[1].toLowerCase() === 'start') {
      const catalog = this.app.systems?.catalog;
      return catalog ? matching(catalog.list().map((event) => event.id)) : [];
    }
    return [];
  }

  private handleSet(systems: CalendarSystems, args: readonly string[]): string {
    const { messages, calendar } = systems;
    if (args.length < 2) return messages.get('commands.set-usage');

    const field = args[0].toLowerCase();
    if (!isDateField(field)) return messages.get('commands.set-usage');

    const value = parseWholeNumber(args[1]);
    if (value === null) return messages.get('commands.invalid-value-number');

    if (!calendar.set(field, value)) {
      switch (field) {
        case 'day':
          return messages.get('commands.invalid-value-day', { maxDays: calendar.monthLength });
        case 'month':
          return messages.get('commands.invalid-value-month');
        case 'year':
          return messages.get('commands.invalid-value-year');
      }
    }

    systems.events.handleDateChange();
    systems.clock.forceUpdate();
    return messages.get('commands.date-updated', { date: formatDate(calendar.current) });
  }

  private handleEvent(systems: CalendarSystems, args: readonly string[]): string {
    const { messages, events } = systems;
    const action = (args[0] ?? '').toLowerCase();

    switch (action) {
      case 'start': {
        const id = args[1];
        if (!id) return messages.get('commands.event-start-usage');
        const result = events.forceStartEvent(id);
        if (!result.ok) return messages.get('commands.event-not-found', { eventName: result.id });
        return messages.get('commands.event-started', { eventName: result.event.displayName });
      }
      case 'end':
        return events.endActiveEvent()
          ? messages.get('commands.event-ended')
          : messages.get('commands.event-none-active');
      case 'status': {
        const active = events.activeEvent;
        if (!active) return messages.get('commands.event-status-none');
        const remaining = events.daysRemaining ?? 0;
        const daysRemaining = active.durationDays === -1
          ? messages.get('calendar.days-indefinite')
          : messages.get('calendar.days-remaining', { days: remaining });
        return messages.get('commands.event-status-active', { eventName: active.displayName, daysRemaining });
      }
      default:
        return messages.get('commands.event-usage');
    }
  }
}
