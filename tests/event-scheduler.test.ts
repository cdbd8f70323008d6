import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CalendarState } from '../src/calendar.ts';
import { EventCatalog } from '../src/catalog.ts';
import { EventScheduler, isEligible } from '../src/event-scheduler.ts';
import { EventBus } from '../src/events.ts';
import { defineEvent, scriptedRandom } from './helpers.ts';
import type { CalendarDate, EventDefinition } from '../src/types.ts';
import type { Random } from '../src/rng.ts';

const harvest = defineEvent({
  id: 'harvest',
  displayName: 'Harvest',
  kind: 'annual',
  triggerSpec: '21/9',
  durationDays: 3,
  startActions: ['say harvest begins'],
  endActions: ['say harvest ends'],
});

const eclipse = defineEvent({
  id: 'eclipse',
  displayName: 'Eclipse',
  kind: 'random',
  chancePercent: 100,
  durationDays: -1,
  startActions: ['say darkness'],
  endActions: ['say light'],
});

function setup(events: EventDefinition[], date: CalendarDate, rng: Random = scriptedRandom([0.999])) {
  const calendar = new CalendarState(date);
  const dispatched: string[] = [];
  const bus = new EventBus();
  const published: string[] = [];
  bus.subscribe('event-started', (event) => { published.push(`started:${event.event.id}`); });
  bus.subscribe('event-ended', (event) => { published.push(`ended:${event.event.id}`); });
  const scheduler = new EventScheduler({
    calendar,
    catalog: new EventCatalog(events),
    actions: { dispatch: (action) => { dispatched.push(action); } },
    bus,
    rng,
  });
  const nextDay = () => {
    calendar.advance();
    scheduler.onNewDay();
  };
  return { calendar, dispatched, published, scheduler, nextDay };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('isEligible', () => {
  const rng = scriptedRandom([0.999]);

  it('matches fixed-date events on the exact year only', () => {
    const founding = defineEvent({ id: 'founding', kind: 'fixed-date', triggerSpec: '1/1/2' });
    expect(isEligible(founding, { day: 1, month: 1, year: 2 }, rng)).toBe(true);
    expect(isEligible(founding, { day: 1, month: 1, year: 3 }, rng)).toBe(false);
  });

  it('matches annual events every year', () => {
    expect(isEligible(harvest, { day: 21, month: 9, year: 1 }, rng)).toBe(true);
    expect(isEligible(harvest, { day: 21, month: 9, year: 40 }, rng)).toBe(true);
    expect(isEligible(harvest, { day: 22, month: 9, year: 1 }, rng)).toBe(false);
  });

  it('never matches a malformed trigger', () => {
    const broken = defineEvent({ id: 'broken', kind: 'annual', triggerSpec: '21-9' });
    expect(isEligible(broken, { day: 21, month: 9, year: 1 }, rng)).toBe(false);
  });

  it('limits random events to their seasons', () => {
    const blizzard = defineEvent({ id: 'blizzard', chancePercent: 100, eligibleSeasons: new Set(['winter'] as const) });
    expect(isEligible(blizzard, { day: 1, month: 1, year: 1 }, rng)).toBe(true);
    expect(isEligible(blizzard, { day: 1, month: 7, year: 1 }, rng)).toBe(false);
  });

  it('rolls against the chance percentage', () => {
    const rare = defineEvent({ id: 'rare', chancePercent: 5 });
    expect(isEligible(rare, { day: 1, month: 1, year: 1 }, scriptedRandom([0.041]))).toBe(true);
    expect(isEligible(rare, { day: 1, month: 1, year: 1 }, scriptedRandom([0.051]))).toBe(false);
  });
});

describe('EventScheduler', () => {
  it('keeps an event for its duration and ends it on the following day', () => {
    const { scheduler, dispatched, nextDay } = setup([harvest], { day: 20, month: 9, year: 1 });

    nextDay(); // 21 September
    expect(scheduler.activeEvent?.id).toBe('harvest');
    expect(scheduler.daysRemaining).toBe(3);

    nextDay(); // 22
    nextDay(); // 23
    expect(scheduler.activeEvent?.id).toBe('harvest');
    expect(scheduler.daysRemaining).toBe(1);

    nextDay(); // 24
    expect(scheduler.activeEvent).toBeNull();
    expect(dispatched).toEqual(['say harvest begins', 'say harvest ends']);
  });

  it('runs an indefinite event until it is ended by hand', () => {
    const { scheduler, dispatched, nextDay } = setup([eclipse], { day: 1, month: 1, year: 1 });

    nextDay();
    for (let i = 0; i < 30; i++) nextDay();
    expect(scheduler.activeEvent?.id).toBe('eclipse');
    expect(dispatched).toEqual(['say darkness']);

    expect(scheduler.endActiveEvent()?.id).toBe('eclipse');
    expect(scheduler.activeEvent).toBeNull();
    expect(dispatched).toEqual(['say darkness', 'say light']);
  });

  it('starts at most one event a day, first by id', () => {
    const other = defineEvent({ ...harvest, id: 'autumn_fair' });
    const { scheduler, dispatched, nextDay } = setup([harvest, other], { day: 20, month: 9, year: 1 });

    nextDay();
    expect(scheduler.activeEvent?.id).toBe('autumn_fair');
    expect(dispatched).toEqual(['say harvest begins']);
  });

  it('does not start anything while an event is running', () => {
    const { scheduler, nextDay } = setup([harvest, eclipse], { day: 19, month: 9, year: 1 });

    nextDay(); // 20 September: eclipse rolls 100%
    expect(scheduler.activeEvent?.id).toBe('eclipse');

    nextDay(); // 21 September: harvest is due but the slot is taken
    expect(scheduler.activeEvent?.id).toBe('eclipse');
  });

  it('ends the running event before a forced start', () => {
    const { scheduler, dispatched, published } = setup([harvest, eclipse], { day: 1, month: 1, year: 1 });

    expect(scheduler.forceStartEvent('eclipse').ok).toBe(true);
    const result = scheduler.forceStartEvent('HARVEST');

    expect(result).toEqual({ ok: true, event: harvest });
    expect(dispatched).toEqual(['say darkness', 'say light', 'say harvest begins']);
    expect(published).toEqual(['started:eclipse', 'ended:eclipse', 'started:harvest']);
    expect(scheduler.daysRemaining).toBe(3);
  });

  it('reports an unknown id without touching the active event', () => {
    const { scheduler } = setup([harvest], { day: 1, month: 1, year: 1 });
    scheduler.forceStartEvent('harvest');

    expect(scheduler.forceStartEvent('Missing')).toEqual({ ok: false, reason: 'not-found', id: 'missing' });
    expect(scheduler.activeEvent?.id).toBe('harvest');
  });

  it('can force-start an event whose trigger is malformed', () => {
    const broken = defineEvent({ id: 'broken', kind: 'annual', triggerSpec: '21-9' });
    const { scheduler } = setup([broken], { day: 1, month: 1, year: 1 });
    expect(scheduler.forceStartEvent('broken').ok).toBe(true);
  });

  it('returns null when ending with nothing active', () => {
    const { scheduler, published } = setup([harvest], { day: 1, month: 1, year: 1 });
    expect(scheduler.endActiveEvent()).toBeNull();
    expect(published).toEqual([]);
  });

  it('ends the active event on a date change and checks the new date', () => {
    const { scheduler, calendar, dispatched } = setup([harvest, eclipse], { day: 1, month: 1, year: 1 });
    scheduler.forceStartEvent('eclipse');

    calendar.restore({ day: 21, month: 9, year: 1 });
    scheduler.handleDateChange();

    // eclipse sorts first and rolls 100%, so it starts again
    expect(scheduler.activeEvent?.id).toBe('eclipse');
    expect(dispatched).toEqual(['say darkness', 'say light', 'say darkness']);
  });

  it('starts a due event after a date change with nothing active', () => {
    const { scheduler, calendar } = setup([harvest], { day: 1, month: 1, year: 1 });
    calendar.set('month', 9);
    calendar.set('day', 21);
    scheduler.handleDateChange();
    expect(scheduler.activeEvent?.id).toBe('harvest');
  });

  it('restores a snapshot without running start actions', () => {
    const { scheduler, dispatched, published } = setup([harvest], { day: 22, month: 9, year: 1 });

    scheduler.restore({ id: 'harvest', daysRemaining: 2 });

    expect(scheduler.snapshot()).toEqual({ id: 'harvest', daysRemaining: 2 });
    expect(dispatched).toEqual([]);
    expect(published).toEqual([]);
  });

  it('ends a restored event that left the catalog with its old actions', () => {
    const { scheduler, dispatched, published } = setup([], { day: 1, month: 1, year: 1 });

    scheduler.restore({ id: 'eclipse', daysRemaining: -1 }, eclipse);

    expect(scheduler.activeEvent).toBeNull();
    expect(dispatched).toEqual(['say light']);
    expect(published).toEqual(['ended:eclipse']);
  });

  it('ends a restored finite event whose countdown never runs out', () => {
    const { scheduler, dispatched, published } = setup([harvest], { day: 22, month: 9, year: 1 });

    scheduler.restore({ id: 'harvest', daysRemaining: -1 });

    expect(scheduler.activeEvent).toBeNull();
    expect(dispatched).toEqual(['say harvest ends']);
    expect(published).toEqual(['ended:harvest']);
  });

  it('caps a restored countdown at the current duration', () => {
    const { scheduler, nextDay } = setup([harvest], { day: 22, month: 9, year: 1 });

    scheduler.restore({ id: 'harvest', daysRemaining: 9 });
    expect(scheduler.snapshot()).toEqual({ id: 'harvest', daysRemaining: 3 });

    nextDay();
    nextDay();
    expect(scheduler.activeEvent?.id).toBe('harvest');
    nextDay();
    expect(scheduler.activeEvent).toBeNull();
  });

  it('runs a restored event until ended once it is defined as indefinite', () => {
    const { scheduler, nextDay } = setup([eclipse], { day: 1, month: 1, year: 1 });

    scheduler.restore({ id: 'eclipse', daysRemaining: 4 });
    for (let i = 0; i < 10; i += 1) nextDay();

    expect(scheduler.snapshot()).toEqual({ id: 'eclipse', daysRemaining: -1 });
  });

  it('keeps going when an action fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const calendar = new CalendarState();
    const ran: string[] = [];
    const scheduler = new EventScheduler({
      calendar,
      catalog: new EventCatalog([defineEvent({ id: 'noisy', startActions: ['explode', 'say ok'] })]),
      actions: {
        dispatch: (action) => {
          if (action === 'explode') throw new Error('boom');
          ran.push(action);
        },
      },
      bus: new EventBus(),
      rng: scriptedRandom([0]),
    });

    scheduler.forceStartEvent('noisy');
    expect(ran).toEqual(['say ok']);
    expect(scheduler.activeEvent?.id).toBe('noisy');
  });
});
