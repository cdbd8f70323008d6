import type { PhaseDurations } from './config.ts';
import type { Season } from './types.ts';

/** Host ticks in one full day/night cycle. */
export const DAY_CYCLE_TICKS = 24000;
/** Host tick at which day turns to night. */
export const SUNSET_TICKS = 13000;

export type Phase = 'day' | 'night';

export interface TickRates {
  day: number; // host ticks per real second
  night: number;
}

export function phaseAt(timeOfDay: number): Phase {
  return timeOfDay < SUNSET_TICKS ? 'day' : 'night';
}

/**
 * Turns the configured real-time length of each phase into the host tick
 * rate that stretches the phase across that many seconds.
 */
export class SeasonalRateTable {
  private rates: TickRates = { day: 0, night: 0 };

  constructor(private readonly durations: Readonly<Record<Season, PhaseDurations>>) {}

  lookup(season: Season): TickRates {
    const { daySeconds, nightSeconds } = this.durations[season];
    return {
      day: SUNSET_TICKS / daySeconds,
      night: (DAY_CYCLE_TICKS - SUNSET_TICKS) / nightSeconds,
    };
  }

  refresh(season: Season): TickRates {
    this.rates = this.lookup(season);
    return this.rates;
  }

  get current(): TickRates {
    return this.rates;
  }

  rateFor(phase: Phase): number {
    return phase === 'day' ? this.rates.day : this.rates.night;
  }
}
