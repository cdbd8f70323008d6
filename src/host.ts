/**
 * HOST BOUNDARY
 *
 * The calendar never owns the world clock. It reads and advances a host
 * world through HostWorld and asks the host to run commands and broadcast
 * messages through Host. SimulatedHost is an in-process host used by the
 * standalone entry point and the tests.
 */

import { DAY_CYCLE_TICKS } from './rates.ts';

export interface HostPlayer {
  name: string;
  sleeping: boolean;
  sleepingIgnored: boolean;
}

export interface HostWorld {
  readonly name: string;
  /** Total ticks since the world was created; never decreases. */
  getFullTime(): number;
  /** Position inside the current day/night cycle, 0-23999. */
  getTimeOfDay(): number;
  advanceBy(ticks: number): void;
  isThundering(): boolean;
  hasStorm(): boolean;
  /** Whether the host runs its own day/night progression. */
  setDaylightCycle(enabled: boolean): void;
  getPlayers(): readonly HostPlayer[];
}

export interface Host {
  getPrimaryWorld(): HostWorld | undefined;
  dispatchCommand(command: string): void;
  broadcast(message: string): void;
}

export class SimulatedWorld implements HostWorld {
  private fullTime: number;
  private thundering = false;
  private storm = false;
  private players: HostPlayer[] = [];
  daylightCycle = true;

  constructor(readonly name = 'world', fullTime = 0) {
    this.fullTime = fullTime;
  }

  getFullTime(): number {
    return this.fullTime;
  }

  getTimeOfDay(): number {
    return this.fullTime % DAY_CYCLE_TICKS;
  }

  advanceBy(ticks: number): void {
    if (ticks <= 0) return;
    this.fullTime += ticks;
  }

  isThundering(): boolean {
    return this.thundering;
  }

  hasStorm(): boolean {
    return this.storm;
  }

  setDaylightCycle(enabled: boolean): void {
    this.daylightCycle = enabled;
  }

  getPlayers(): readonly HostPlayer[] {
    return this.players;
  }

  setPlayers(players: HostPlayer[]): void {
    this.players = players;
  }

  setWeather(weather: 'clear' | 'rain' | 'thunder'): void {
    this.storm = weather !== 'clear';
    this.thundering = weather === 'thunder';
  }

  /** Jumps to the next morning, the way a host does when everyone sleeps. */
  skipToMorning(): void {
    const timeOfDay = this.getTimeOfDay();
    if (timeOfDay === 0) return;
    this.fullTime += DAY_CYCLE_TICKS - timeOfDay;
  }
}

export class SimulatedHost implements Host {
  readonly dispatched: string[] = [];
  readonly broadcasts: string[] = [];

  constructor(private readonly world: SimulatedWorld | undefined = new SimulatedWorld()) {}

  getPrimaryWorld(): SimulatedWorld | undefined {
    return this.world;
  }

  dispatchCommand(command: string): void {
    this.dispatched.push(command);
    const [name, ...args] = command.trim().split(/\s+/);
    if (name === 'weather' && this.world) {
      const weather = args[0];
      if (weather === 'clear' || weather === 'rain' || weather === 'thunder') {
        this.world.setWeather(weather);
      }
    }
  }

  broadcast(message: string): void {
    this.broadcasts.push(message);
  }
}
