import type { HostWorld } from './host.ts';

/** Wake-ups inside this window count as a completed night's sleep. */
const MORNING_END_TICKS = 1000;

export interface TimeSkipListener {
  acceptTimeSkip(): void;
}

/**
 * While enough players sleep, the host gets its daylight cycle back so it
 * can run its own skip to morning. On waking the calendar takes the clock
 * again and the driver drops its pending fraction.
 */
export class SleepCoordinator {
  constructor(
    private readonly world: HostWorld | undefined,
    private readonly clock: TimeSkipListener,
    private readonly percentageNeeded: number
  ) {}

  /** Returns true when control was handed to the host. */
  onBedEnter(): boolean {
    const world = this.world;
    if (!world) return false;

    const players = world.getPlayers();
    const counted = players.filter(player => !player.sleepingIgnored).length;
    if (counted === 0) return false;

    const sleeping = players.filter(player => !player.sleepingIgnored && player.sleeping).length;
    const percentage = (sleeping / counted) * 100;
    if (percentage < this.percentageNeeded) return false;

    console.log(`😴 ${Math.floor(percentage)}% of players are asleep, handing the clock to the host`);
    world.setDaylightCycle(true);
    return true;
  }

  /** Returns true when the calendar took the clock back. */
  onBedLeave(): boolean {
    const world = this.world;
    if (!world) return false;

    const timeOfDay = world.getTimeOfDay();
    if (timeOfDay < 0 || timeOfDay >= MORNING_END_TICKS) return false;

    console.log('🌅 Players woke up, taking the clock back');
    world.setDaylightCycle(false);
    this.clock.acceptTimeSkip();
    return true;
  }
}
