import { formatDate } from './calendar.ts';
import { DAY_CYCLE_TICKS } from './rates.ts';
import type { CalendarState } from './calendar.ts';
import type { DisplaySettings } from './config.ts';
import type { HostWorld } from './host.ts';
import type { Messages } from './messages.ts';

export interface StatusLine {
  title: string;
  progress: number; // 0-1
}

/** Shows the status line to players (boss bar, scoreboard, console...). */
export interface StatusRenderer {
  render(status: StatusLine): void;
  clear(): void;
}

export interface DisplayCacheDeps {
  calendar: CalendarState;
  messages: Messages;
  settings: DisplaySettings;
  world: HostWorld | undefined;
  renderer: StatusRenderer;
}

// Tick 0 is 06:00 on the host clock
export function formatTimeOfDay(timeOfDay: number): string {
  const hours = (Math.floor(timeOfDay / 1000) + 6) % 24;
  const minutes = Math.floor(((timeOfDay % 1000) / 1000) * 60);
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Caches the date/season/weather part of the status line. It is rebuilt
 * only when one of day, month, year, thunder or rain differs from the last
 * refresh; the clock and progress are filled in on every call.
 */
export class DisplayCache {
  private prefixText = '';
  private lastDay = -1;
  private lastMonth = -1;
  private lastYear = -1;
  private lastThunder = false;
  private lastRain = false;

  constructor(private readonly deps: DisplayCacheDeps) {}

  get prefix(): string {
    return this.prefixText;
  }

  refresh(): StatusLine | null {
    const { calendar, settings, world, renderer } = this.deps;
    if (!settings.enabled || !world) return null;

    const { day, month, year } = calendar.current;
    const thundering = world.isThundering();
    const raining = world.hasStorm();

    let stale = this.prefixText === '';
    if (day !== this.lastDay || month !== this.lastMonth || year !== this.lastYear) {
      this.lastDay = day;
      this.lastMonth = month;
      this.lastYear = year;
      stale = true;
    }
    if (thundering !== this.lastThunder || raining !== this.lastRain) {
      this.lastThunder = thundering;
      this.lastRain = raining;
      stale = true;
    }
    if (stale) {
      this.prefixText = this.buildPrefix(thundering, raining);
    }

    const timeOfDay = world.getTimeOfDay();
    const progress = settings.showProgressBar ? Math.max(0, Math.min(1, timeOfDay / DAY_CYCLE_TICKS)) : 0;
    const status: StatusLine = {
      title: this.prefixText.split('{time}').join(formatTimeOfDay(timeOfDay)),
      progress,
    };
    renderer.render(status);
    return status;
  }

  private buildPrefix(thundering: boolean, raining: boolean): string {
    const { calendar, messages, settings } = this.deps;
    const weatherKey = thundering ? 'display.weather-storm' : raining ? 'display.weather-rain' : 'display.weather-clear';
    return settings.format
      .split('{date}').join(formatDate(calendar.current))
      .split('{season}').join(messages.get(`seasons.${calendar.season}`))
      .split('{weather}').join(messages.get(weatherKey));
  }
}
