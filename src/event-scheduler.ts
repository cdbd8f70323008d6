/**
 * EVENT SCHEDULER
 *
 * Holds at most one active event. Once per calendar day it counts the active
 * event down, ends it when the countdown hits zero, and when nothing is
 * running tries the catalog in id order, starting the first event whose
 * trigger matches today.
 */

import { seasonOf } from './calendar.ts';
import { parseTriggerDate } from './catalog.ts';
import { rollPercent } from './rng.ts';
import type { CalendarState } from './calendar.ts';
import type { EventCatalog } from './catalog.ts';
import type { EventBus } from './events.ts';
import type { Random } from './rng.ts';
import type { ActiveEventSnapshot, CalendarDate, EventDefinition } from './types.ts';

/** Runs event start/end actions; the host decides what an action string means. */
export interface ActionExecutor {
  dispatch(action: string): void;
}

export interface EventSchedulerDeps {
  calendar: CalendarState;
  catalog: EventCatalog;
  actions: ActionExecutor;
  bus: EventBus;
  rng: Random;
}

export type ForceStartResult =
  | { ok: true; event: EventDefinition }
  | { ok: false; reason: 'not-found'; id: string };

interface ActiveSlot {
  event: EventDefinition;
  daysRemaining: number;
}

export function isEligible(event: EventDefinition, date: CalendarDate, rng: Random): boolean {
  switch (event.kind) {
    case 'fixed-date': {
      const parts = parseTriggerDate(event.triggerSpec, 3);
      return parts !== null && parts[0] === date.day && parts[1] === date.month && parts[2] === date.year;
    }
    case 'annual': {
      const parts = parseTriggerDate(event.triggerSpec, 2);
      return parts !== null && parts[0] === date.day && parts[1] === date.month;
    }
    case 'random': {
      const seasonMatch = event.eligibleSeasons.size === 0 || event.eligibleSeasons.has(seasonOf(date.month));
      return seasonMatch && rollPercent(rng, event.chancePercent);
    }
    default: {
      const unreachable: never = event.kind;
      return unreachable;
    }
  }
}

export class EventScheduler {
  private slot: ActiveSlot | null = null;

  constructor(private readonly deps: EventSchedulerDeps) {}

  get activeEvent(): EventDefinition | null {
    return this.slot?.event ?? null;
  }

  get daysRemaining(): number | null {
    return this.slot?.daysRemaining ?? null;
  }

  onNewDay(): void {
    if (this.slot) {
      if (this.slot.daysRemaining > 0) {
        this.slot.daysRemaining -= 1;
      }
      if (this.slot.daysRemaining === 0 && this.slot.event.durationDays !== -1) {
        this.endActiveEvent();
      }
    }

    if (!this.slot) {
      this.tryStartForToday();
    }
  }

  /**
   * A manual date change is a jump, not a day passing: whatever was running
   * ends outright and today's triggers are evaluated fresh.
   */
  handleDateChange(): void {
    if (this.slot) {
      console.log(`📅 Date changed by hand, ending '${this.slot.event.displayName}'`);
      this.endActiveEvent();
    }
    this.tryStartForToday();
  }

  forceStartEvent(id: string): ForceStartResult {
    const event = this.deps.catalog.get(id);
    if (!event) {
      return { ok: false, reason: 'not-found', id: id.toLowerCase() };
    }
    if (this.slot) {
      this.endActiveEvent();
    }
    this.start(event);
    return { ok: true, event };
  }

  endActiveEvent(): EventDefinition | null {
    const slot = this.slot;
    if (!slot) return null;

    console.log(`🏁 Event ended: ${slot.event.displayName}`);
    this.slot = null;
    this.finish(slot.event);
    return slot.event;
  }

  snapshot(): ActiveEventSnapshot | null {
    return this.slot ? { id: this.slot.event.id, daysRemaining: this.slot.daysRemaining } : null;
  }

  /**
   * Puts a previously running event back without re-running its start
   * actions. The countdown is fitted to the current definition: an
   * indefinite event runs until ended, a finite one keeps at most its
   * duration and ends at once with nothing left. An event that has since
   * left the catalog is ended with the definition it was started from, when
   * that is known.
   */
  restore(snapshot: ActiveEventSnapshot, previous?: EventDefinition): void {
    const event = this.deps.catalog.get(snapshot.id);
    if (!event) {
      console.warn(`⚠️  Active event '${snapshot.id}' is no longer in the catalog`);
      if (previous) this.finish(previous);
      return;
    }

    if (event.durationDays === -1) {
      this.slot = { event, daysRemaining: -1 };
      return;
    }
    if (snapshot.daysRemaining < 1) {
      console.warn(`⚠️  Active event '${event.id}' has no days left (${snapshot.daysRemaining}), ending it`);
      this.finish(event);
      return;
    }
    this.slot = { event, daysRemaining: Math.min(snapshot.daysRemaining, event.durationDays) };
  }

  private tryStartForToday(): void {
    const today = this.deps.calendar.current;
    for (const event of this.deps.catalog.list()) {
      if (isEligible(event, today, this.deps.rng)) {
        this.start(event);
        break; // at most one start per day
      }
    }
  }

  private start(event: EventDefinition): void {
    this.slot = { event, daysRemaining: event.durationDays };
    console.log(`🎉 Event started: ${event.displayName}`);
    this.runActions(event.startActions);
    this.deps.bus.publish({ kind: 'event-started', event, date: this.deps.calendar.current });
  }

  private finish(event: EventDefinition): void {
    this.runActions(event.endActions);
    this.deps.bus.publish({ kind: 'event-ended', event, date: this.deps.calendar.current });
  }

  private runActions(actions: readonly string[]): void {
    for (const action of actions) {
      try {
        this.deps.actions.dispatch(action);
      } catch (error) {
        console.error(`Failed to run event action "${action}":`, error);
      }
    }
  }
}
