import { formatDate } from './calendar.ts';
import { DAY_CYCLE_TICKS, phaseAt } from './rates.ts';
import type { CalendarState } from './calendar.ts';
import type { DisplayCache } from './display.ts';
import type { SeasonalEffects } from './effects.ts';
import type { EventScheduler } from './event-scheduler.ts';
import type { EventBus } from './events.ts';
import type { HostWorld } from './host.ts';
import type { SeasonalRateTable } from './rates.ts';
import type { Season } from './types.ts';

/**
 * Clock driver for the seasonal calendar
 *
 * Time Model:
 * - The host owns the tick counter; its own daylight cycle is switched off
 *   and this driver advances the counter instead
 * - Every invocation adds the current phase rate to a fractional accumulator
 *   and applies only the whole ticks, so rounding never drifts by more than
 *   one tick however long the clock runs
 * - Calendar days are derived from the host counter (24000 ticks per day);
 *   every whole day crossed since the last check is replayed in order
 */

export interface ClockDriverDeps {
  world: HostWorld | undefined;
  calendar: CalendarState;
  events: EventScheduler;
  rates: SeasonalRateTable;
  display: DisplayCache;
  effects: SeasonalEffects;
  bus: EventBus;
  intervalMs: number; // real time between invocations
}

export class ClockDriver {
  private running = false;
  private wake: (() => void) | null = null;
  private readonly world: HostWorld | null;

  private tickAccumulator: number;
  private lastCheckedTotalDays: number;
  private lastCheckedSeason: Season;
  private cachedMonth: number;

  constructor(private readonly deps: ClockDriverDeps, initialAccumulator = 0) {
    this.world = deps.world ?? null;
    if (!this.world) {
      console.error('🚨 No host world found! The calendar clock is disabled.');
    }
    this.tickAccumulator = initialAccumulator;
    this.lastCheckedTotalDays = this.world ? Math.floor(this.world.getFullTime() / DAY_CYCLE_TICKS) : 0;
    this.lastCheckedSeason = deps.calendar.season;
    this.cachedMonth = deps.calendar.current.month;
    this.updateSeasonalSpeed();
  }

  get enabled(): boolean {
    return this.world !== null;
  }

  /** Fractional host ticks earned but not yet applied. */
  get accumulator(): number {
    return this.tickAccumulator;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * One clock invocation. Advances the host, replays crossed days, reacts to
   * month and season changes, then refreshes the display.
   */
  tick(): void {
    const world = this.world;
    if (!world) return;

    const secondsPerInvocation = this.deps.intervalMs / 1000;
    const rate = this.deps.rates.rateFor(phaseAt(world.getTimeOfDay()));
    this.tickAccumulator += rate * secondsPerInvocation;
    const ticksToApply = Math.floor(this.tickAccumulator);

    if (ticksToApply > 0) {
      world.advanceBy(ticksToApply);
      this.tickAccumulator -= ticksToApply;
    }

    const currentTotalDays = Math.floor(world.getFullTime() / DAY_CYCLE_TICKS);
    if (currentTotalDays > this.lastCheckedTotalDays) {
      const daysPassed = currentTotalDays - this.lastCheckedTotalDays;
      for (let i = 0; i < daysPassed; i++) {
        const date = this.deps.calendar.advance();
        this.deps.bus.publish({ kind: 'day-advanced', date });
        this.deps.events.onNewDay();
      }
      this.lastCheckedTotalDays = currentTotalDays;

      if (this.deps.calendar.current.month !== this.cachedMonth) {
        this.updateSeasonalSpeed();
        this.checkSeasonChange();
      }
    }

    this.deps.display.refresh();
  }

  /**
   * The host jumped time forward on its own (players slept). Only the
   * unapplied fraction is dropped; the crossed days are still picked up by
   * the next tick.
   */
  acceptTimeSkip(): void {
    this.tickAccumulator = 0;
  }

  /** Applies a manual date or settings change right away instead of on the next tick. */
  forceUpdate(): void {
    this.updateSeasonalSpeed();
    this.checkSeasonChange();
    this.deps.display.refresh();
  }

  /**
   * Run the clock until stop() is called. Resolves once the loop has exited.
   */
  async runRealTime(): Promise<void> {
    if (this.running || !this.world) return;
    this.running = true;

    console.log(`⏱️  Calendar clock started on ${formatDate(this.deps.calendar.current)}`);

    while (this.running) {
      try {
        this.tick();
      } catch (error) {
        console.error('Error during calendar tick:', error);
      }
      await this.sleep(this.deps.intervalMs);
    }
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.wake?.();
    console.log(`⏹️  Calendar clock stopped on ${formatDate(this.deps.calendar.current)}`);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private updateSeasonalSpeed(): void {
    this.cachedMonth = this.deps.calendar.current.month;
    this.deps.rates.refresh(this.deps.calendar.season);
  }

  private checkSeasonChange(): void {
    const newSeason = this.deps.calendar.season;
    if (newSeason === this.lastCheckedSeason) return;

    const previous = this.lastCheckedSeason;
    console.log(`🌦️  Season changed from ${previous} to ${newSeason}`);
    this.lastCheckedSeason = newSeason;
    this.deps.effects.handleSeasonChange(newSeason);
    this.deps.bus.publish({ kind: 'season-changed', from: previous, to: newSeason });
  }
}
