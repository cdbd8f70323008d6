export type Season = 'winter' | 'spring' | 'summer' | 'autumn';

export const SEASONS: readonly Season[] = ['winter', 'spring', 'summer', 'autumn'];

export interface CalendarDate {
  day: number;
  month: number; // 1-12
  year: number;
}

export type DateField = 'day' | 'month' | 'year';

export type EventKind = 'fixed-date' | 'annual' | 'random';

export interface EventDefinition {
  readonly id: string;
  readonly displayName: string;
  readonly kind: EventKind;
  readonly triggerSpec: string; // "D/M/Y" for fixed-date, "D/M" for annual
  readonly chancePercent: number; // 0-100, random events only
  readonly eligibleSeasons: ReadonlySet<Season>;
  readonly durationDays: number; // -1 = until ended by hand
  readonly startActions: readonly string[];
  readonly endActions: readonly string[];
}

export interface ActiveEventSnapshot {
  id: string;
  daysRemaining: number;
}

// ============================================================================
// BUS EVENTS
// ============================================================================

export interface SeasonChangedEvent {
  kind: 'season-changed';
  from: Season;
  to: Season;
}

export interface DayAdvancedEvent {
  kind: 'day-advanced';
  date: CalendarDate;
}

export interface EventStartedEvent {
  kind: 'event-started';
  event: EventDefinition;
  date: CalendarDate;
}

export interface EventEndedEvent {
  kind: 'event-ended';
  event: EventDefinition;
  date: CalendarDate;
}

export type BusEvent = SeasonChangedEvent | DayAdvancedEvent | EventStartedEvent | EventEndedEvent;

// ============================================================================
// LOGGING
// ============================================================================

export type LogCategory = 'calendar' | 'season' | 'event' | 'system';

export interface LogEntry {
  category: LogCategory;
  summary: string;
  details?: string;
  date: CalendarDate;
  realTime: Date;
}
