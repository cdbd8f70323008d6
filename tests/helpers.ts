import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CalendarApp } from '../src/app.ts';
import { loadConfig } from '../src/config.ts';
import { SimulatedHost, SimulatedWorld } from '../src/host.ts';
import type { Random } from '../src/rng.ts';
import type { EventDefinition, Season } from '../src/types.ts';

/**
 * Random source that replays the given draws in a loop. int(n) is
 * floor(draw * n), so a draw of 0 makes every chance roll pass and 0.999
 * makes only a 100% roll pass.
 */
export function scriptedRandom(draws: number[]): Random {
  let index = 0;
  const next = (): number => {
    const value = draws[index % draws.length];
    index += 1;
    return value;
  };
  return {
    next,
    int: (maxExclusive: number) => Math.floor(next() * maxExclusive),
    chance: (probability: number) => next() < probability,
  };
}

export function defineEvent(overrides: Partial<EventDefinition> & { id: string }): EventDefinition {
  return {
    displayName: overrides.id,
    kind: 'random',
    triggerSpec: '',
    chancePercent: 0,
    eligibleSeasons: new Set<Season>(),
    durationDays: 1,
    startActions: [],
    endActions: [],
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'season-calendar-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface TestAppOptions {
  fullTime?: number;
  autoStart?: boolean;
  dir?: string;
}

/**
 * A calendar app over a simulated host, storing its files in a fresh temp
 * directory. The clock loop stays off unless asked for; tests drive it with
 * clock.tick().
 */
export async function createTestApp(options: TestAppOptions = {}) {
  const dir = options.dir ?? (await makeTempDir());
  const config = loadConfig({
    CALENDAR_DATA_DIR: dir,
    CALENDAR_LOG_DIR: path.join(dir, 'logs'),
    CALENDAR_SEED: 'test-seed',
  });
  const world = new SimulatedWorld('world', options.fullTime ?? 0);
  const host = new SimulatedHost(world);
  const app = new CalendarApp({
    config,
    host,
    rng: scriptedRandom([0.999]),
    autoStart: options.autoStart ?? false,
  });
  return { dir, config, world, host, app };
}
