import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { SEASONS } from './types.ts';
import type { Season } from './types.ts';

const DEFAULT_PHASE_SECONDS = 600;

export const DEFAULTS_DIR = fileURLToPath(new URL('../defaults/', import.meta.url));

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed <= 0) return fallback;
  return parsed;
}

// ============================================================================
// PROCESS CONFIG (environment)
// ============================================================================

export interface CalendarConfig {
  dataDir: string;
  settingsPath: string; // config.json
  eventsPath: string; // events.json
  dataPath: string; // calendar-data.json
  langDir: string;
  logDir: string;
  tickIntervalMs: number; // real milliseconds between clock invocations
  seed: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalendarConfig {
  const dataDir = env.CALENDAR_DATA_DIR ?? 'data';
  return {
    dataDir,
    settingsPath: path.join(dataDir, 'config.json'),
    eventsPath: path.join(dataDir, 'events.json'),
    dataPath: path.join(dataDir, 'calendar-data.json'),
    langDir: path.join(dataDir, 'lang'),
    logDir: env.CALENDAR_LOG_DIR ?? 'logs',
    tickIntervalMs: parseNumber(env.CALENDAR_TICK_INTERVAL_MS, 1000),
    seed: env.CALENDAR_SEED ?? `seed-${Date.now()}`,
  };
}

// ============================================================================
// SETTINGS (config.json)
// ============================================================================

export interface PhaseDurations {
  daySeconds: number;
  nightSeconds: number;
}

export interface ResourcePack {
  url: string;
  sha1: string;
}

export interface DisplaySettings {
  enabled: boolean;
  showProgressBar: boolean;
  format: string;
}

export interface FarmingSettings {
  crops: Record<Season, string[]>;
  outOfSeasonGrowthChance: Record<Season, number>; // 0-1
}

/** Date block older installs kept inside config.json before the data file existed. */
export interface LegacyCalendarBlock {
  day: number;
  month: number;
  year: number;
  totalTicks: number;
}

export interface CalendarSettings {
  language: string;
  debugMode: boolean;
  timeCycle: Record<Season, PhaseDurations>;
  display: DisplaySettings;
  sleepingPercentage: number;
  farming: FarmingSettings;
  resourcePacks: Record<Season, ResourcePack>;
  legacyCalendar?: LegacyCalendarBlock;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: JsonRecord, key: string): JsonRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function readString(source: JsonRecord, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

function readBoolean(source: JsonRecord, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readPositive(source: JsonRecord, key: string, fallback: number, where: string): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    console.warn(`⚠️  Invalid value for ${where}.${key}: ${JSON.stringify(value)}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readFraction(source: JsonRecord, key: string, fallback: number, where: string): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || value < 0 || value > 1) {
    console.warn(`⚠️  Invalid value for ${where}.${key}: ${JSON.stringify(value)}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readStringList(source: JsonRecord, key: string): string[] {
  const value = source[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function readLegacyBlock(source: JsonRecord): LegacyCalendarBlock | undefined {
  const block = source.calendar;
  if (!isRecord(block)) return undefined;
  const { day, month, year, totalTicks } = block;
  if (typeof day !== 'number' || typeof month !== 'number' || typeof year !== 'number') {
    return undefined;
  }
  return { day, month, year, totalTicks: typeof totalTicks === 'number' ? totalTicks : 0 };
}

export function normalizeSettings(raw: unknown): CalendarSettings {
  const root: JsonRecord = isRecord(raw) ? raw : {};
  const timeCycle = section(root, 'timeCycle');
  const display = section(root, 'display');
  const sleep = section(root, 'sleep');
  const farming = section(root, 'farming');
  const crops = section(farming, 'crops');
  const growth = section(farming, 'outOfSeasonGrowthChance');
  const packs = section(root, 'resourcePacks');

  const perSeason = <T>(read: (season: Season) => T): Record<Season, T> => ({
    winter: read('winter'),
    spring: read('spring'),
    summer: read('summer'),
    autumn: read('autumn'),
  });

  const percentage = readPositive(sleep, 'playersSleepingPercentage', 100, 'sleep');

  return {
    language: readString(root, 'language', 'en_US'),
    debugMode: readBoolean(root, 'debugMode', false),
    timeCycle: perSeason((season) => {
      const durations = section(timeCycle, season);
      const where = `timeCycle.${season}`;
      return {
        daySeconds: readPositive(durations, 'daySeconds', DEFAULT_PHASE_SECONDS, where),
        nightSeconds: readPositive(durations, 'nightSeconds', DEFAULT_PHASE_SECONDS, where),
      };
    }),
    display: {
      enabled: readBoolean(display, 'enabled', true),
      showProgressBar: readBoolean(display, 'showProgressBar', true),
      format: readString(display, 'format', '{date} | {season} | {weather} | {time}'),
    },
    sleepingPercentage: Math.min(100, percentage),
    farming: {
      crops: perSeason((season) => readStringList(crops, season)),
      outOfSeasonGrowthChance: perSeason((season) =>
        readFraction(growth, season, 0.25, 'farming.outOfSeasonGrowthChance')),
    },
    resourcePacks: perSeason((season) => {
      const pack = section(packs, season);
      return { url: readString(pack, 'url', ''), sha1: readString(pack, 'sha1', '') };
    }),
    legacyCalendar: readLegacyBlock(root),
  };
}

/**
 * Reads config.json, copying the bundled default into place first when the
 * file does not exist yet.
 */
export async function loadSettings(settingsPath: string): Promise<CalendarSettings> {
  let raw: string;
  try {
    raw = await readFile(settingsPath, 'utf8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
    raw = await readFile(path.join(DEFAULTS_DIR, 'config.json'), 'utf8');
    await mkdir(path.dirname(settingsPath), { recursive: true });
    await writeFile(settingsPath, raw, 'utf8');
    console.log(`📝 Wrote default settings to ${settingsPath}`);
  }
  return normalizeSettings(parseJsonFile(raw, settingsPath));
}

/** A file that is not valid JSON is logged and read as empty. */
export function parseJsonFile(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    console.warn(`⚠️  ${source} is not valid JSON (${err.message}), ignoring its contents`);
    return undefined;
  }
}

export function isSeason(value: string): value is Season {
  return (SEASONS as readonly string[]).includes(value);
}
