/**
 * CALENDAR APPLICATION
 *
 * Builds every component from configuration and wires them together. All
 * cross-component references are passed in at construction; nothing reaches
 * for a shared instance. A reload snapshots the state that must survive,
 * reads the files again, and only then tears everything down, rebuilds and
 * re-applies the snapshot.
 */

import { CalendarState, formatDate } from './calendar.ts';
import { loadCatalog } from './catalog.ts';
import { loadSettings } from './config.ts';
import { DisplayCache } from './display.ts';
import { SeasonalEffectsManager } from './effects.ts';
import { EventScheduler } from './event-scheduler.ts';
import { EventBus } from './events.ts';
import { SeasonalFarming } from './farming.ts';
import { attachLogger } from './logging.ts';
import { Messages } from './messages.ts';
import { CALENDAR_SCHEMA_VERSION, getModifiedTime, loadCalendarData, saveCalendarData } from './persistence.ts';
import { DAY_CYCLE_TICKS, SeasonalRateTable } from './rates.ts';
import { makeRandom } from './rng.ts';
import { ClockDriver } from './scheduler.ts';
import { SleepCoordinator } from './sleep.ts';
import type { EventCatalog } from './catalog.ts';
import type { CalendarConfig, CalendarSettings } from './config.ts';
import type { StatusLine, StatusRenderer } from './display.ts';
import type { EffectRenderer } from './effects.ts';
import type { Host, HostWorld } from './host.ts';
import type { Logger } from './logging.ts';
import type { CalendarData } from './persistence.ts';
import type { Random } from './rng.ts';
import type { ActiveEventSnapshot, CalendarDate, EventDefinition } from './types.ts';

export interface CalendarAppOptions {
  config: CalendarConfig;
  host: Host;
  renderer?: StatusRenderer;
  effectRenderer?: EffectRenderer;
  logger?: Logger;
  rng?: Random;
  /** Crop names the host knows about; other names in the settings are rejected. */
  knownCrops?: ReadonlySet<string>;
  /** Start the periodic clock on enable. Defaults to true. */
  autoStart?: boolean;
}

export interface CalendarSystems {
  settings: CalendarSettings;
  messages: Messages;
  catalog: EventCatalog;
  bus: EventBus;
  world: HostWorld | undefined;
  calendar: CalendarState;
  rates: SeasonalRateTable;
  events: EventScheduler;
  display: DisplayCache;
  effects: SeasonalEffectsManager;
  clock: ClockDriver;
  sleep: SleepCoordinator;
  farming: SeasonalFarming;
}

interface LoadedResources {
  settings: CalendarSettings;
  messages: Messages;
  catalog: EventCatalog;
  stored: CalendarData | null;
}

/** State carried across a reload. */
interface ReloadSnapshot {
  date: CalendarDate | null; // null when the copy on disk should win
  tickAccumulator: number;
  activeEvent: ActiveEventSnapshot | null;
  activeDefinition: EventDefinition | null;
}

const silentRenderer: StatusRenderer = {
  render(_status: StatusLine) {},
  clear() {},
};

export class CalendarApp {
  private running: CalendarSystems | null = null;
  private loop: Promise<void> | null = null;
  private detachers: Array<() => void> = [];
  private dataFileModTime: number | null = null;
  private readonly rng: Random;

  constructor(private readonly options: CalendarAppOptions) {
    this.rng = options.rng ?? makeRandom(options.config.seed);
  }

  get systems(): CalendarSystems | null {
    return this.running;
  }

  async enable(): Promise<void> {
    if (this.running) return;
    const resources = await this.loadResources();
    this.startup(resources, null);
    console.log('✅ Calendar enabled');
  }

  async disable(): Promise<void> {
    if (!this.running) return;
    await this.save();
    await this.shutdown();
    console.log('👋 Calendar disabled');
  }

  /**
   * Returns false when the files could not be read; the running calendar is
   * then left untouched.
   */
  async reload(): Promise<boolean> {
    const current = this.running;
    if (!current) {
      await this.enable();
      return true;
    }
    console.log('🔄 Reloading calendar...');

    const snapshot: ReloadSnapshot = {
      date: current.calendar.current,
      tickAccumulator: current.clock.accumulator,
      activeEvent: current.events.snapshot(),
      activeDefinition: current.events.activeEvent,
    };

    const diskModTime = await getModifiedTime(this.options.config.dataPath);
    const diskIsNewer =
      diskModTime !== null && (this.dataFileModTime === null || diskModTime > this.dataFileModTime);

    if (diskIsNewer) {
      console.log('📂 Calendar data changed on disk, using the saved date');
      snapshot.date = null;
    } else {
      await this.save();
    }

    let resources: LoadedResources;
    try {
      resources = await this.loadResources();
    } catch (error) {
      console.error('Failed to reload calendar, keeping the running configuration:', error);
      return false;
    }

    await this.shutdown();
    this.startup(resources, snapshot);
    this.running?.clock.forceUpdate();
    console.log('✅ Calendar reloaded');
    return true;
  }

  /** Writes the date and host tick counter. Failures are logged, never thrown. */
  async save(): Promise<void> {
    const systems = this.running;
    if (!systems) return;
    const { dataPath } = this.options.config;

    const data: CalendarData = {
      schemaVersion: CALENDAR_SCHEMA_VERSION,
      date: systems.calendar.current,
      savedTotalTicks: systems.world?.getFullTime() ?? 0,
      activeEvent: systems.events.snapshot() ?? undefined,
      savedAt: new Date().toISOString(),
    };

    try {
      await saveCalendarData(dataPath, data);
      this.dataFileModTime = await getModifiedTime(dataPath);
      console.log(`💾 Calendar saved (${formatDate(data.date)})`);
    } catch (error) {
      console.error('Failed to save calendar:', error);
    }
  }

  private async loadResources(): Promise<LoadedResources> {
    const { config } = this.options;
    const settings = await loadSettings(config.settingsPath);
    const messages = await Messages.load(config.langDir, settings.language);
    const catalog = await loadCatalog(config.eventsPath);
    const stored = await loadCalendarData(config.dataPath, settings.legacyCalendar);
    this.dataFileModTime = await getModifiedTime(config.dataPath);
    return { settings, messages, catalog, stored };
  }

  private startup(resources: LoadedResources, snapshot: ReloadSnapshot | null): void {
    const { config, host } = this.options;
    const { settings, messages, catalog, stored } = resources;
    const world = host.getPrimaryWorld();
    const renderer = this.options.renderer ?? silentRenderer;

    const calendar = this.restoreCalendar(stored, world);
    if (snapshot?.date) {
      calendar.restore(snapshot.date);
    }

    const bus = new EventBus();
    const rates = new SeasonalRateTable(settings.timeCycle);
    const events = new EventScheduler({ calendar, catalog, actions: { dispatch: (action) => host.dispatchCommand(action) }, bus, rng: this.rng });
    const display = new DisplayCache({ calendar, messages, settings: settings.display, world, renderer });
    const effects = new SeasonalEffectsManager({
      messages,
      resourcePacks: settings.resourcePacks,
      renderer: this.options.effectRenderer,
    });
    const clock = new ClockDriver(
      { world, calendar, events, rates, display, effects, bus, intervalMs: config.tickIntervalMs },
      snapshot?.tickAccumulator ?? 0
    );
    const sleep = new SleepCoordinator(world, clock, settings.sleepingPercentage);
    const farming = new SeasonalFarming(settings.farming, this.options.knownCrops);

    const previousEvent = snapshot ? snapshot.activeEvent : stored?.activeEvent ?? null;
    if (previousEvent) {
      events.restore(previousEvent, snapshot?.activeDefinition ?? undefined);
    }

    this.detachers = [
      bus.subscribe('day-advanced', (event) => {
        host.broadcast(messages.get('calendar.new-day', { date: formatDate(event.date) }));
      }),
    ];
    if (this.options.logger) {
      this.detachers.push(attachLogger(bus, this.options.logger, () => calendar.current));
    }

    world?.setDaylightCycle(false);

    this.running = { settings, messages, catalog, bus, world, calendar, rates, events, display, effects, clock, sleep, farming };

    effects.handleSeasonChange(calendar.season);
    if (this.options.autoStart ?? true) {
      this.loop = clock.runRealTime().catch((error) => console.error('Calendar clock crashed:', error));
    }
  }

  /**
   * Builds the calendar from the saved date and replays every host day
   * boundary crossed since it was saved. On a first start the world's own
   * age counts as elapsed days.
   */
  private restoreCalendar(stored: CalendarData | null, world: HostWorld | undefined): CalendarState {
    const currentTicks = world?.getFullTime() ?? 0;
    const calendar = new CalendarState(stored?.date);
    const savedTicks = stored?.savedTotalTicks ?? 0;

    const catchUp = Math.floor(currentTicks / DAY_CYCLE_TICKS) - Math.floor(savedTicks / DAY_CYCLE_TICKS);
    if (catchUp > 0) {
      const reason = stored ? 'passed while offline' : 'already elapsed in the world';
      console.log(`⏳ Catching up ${catchUp} days ${reason}`);
      calendar.advanceBy(catchUp);
    }
    return calendar;
  }

  private async shutdown(): Promise<void> {
    const systems = this.running;
    if (!systems) return;

    systems.clock.stop();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    systems.effects.stopAllEffects();
    (this.options.renderer ?? silentRenderer).clear();
    systems.world?.setDaylightCycle(true);
    for (const detach of this.detachers) detach();
    this.detachers = [];
    systems.bus.clear();
    this.running = null;
  }
}
