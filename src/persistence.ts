import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import path from 'path';
import { daysInMonth, isValidDate } from './calendar.ts';
import { parseJsonFile } from './config.ts';
import type { LegacyCalendarBlock } from './config.ts';
import type { ActiveEventSnapshot, CalendarDate } from './types.ts';

// Schema version - increment when making breaking changes
// v1: flat { day, month, year, totalTicks }, first kept inside config.json
// v2: { date, savedTotalTicks, activeEvent, savedAt }
export const CALENDAR_SCHEMA_VERSION = 2;

export interface CalendarData {
  schemaVersion: number;
  date: CalendarDate;
  /** Host tick counter when the date was saved; used to replay offline days. */
  savedTotalTicks: number;
  activeEvent?: ActiveEventSnapshot;
  savedAt: string;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : fallback;
}

function normalizeDate(raw: JsonRecord): CalendarDate {
  const date = {
    day: toInt(raw.day, 1),
    month: toInt(raw.month, 1),
    year: toInt(raw.year, 1),
  };
  if (isValidDate(date)) return date;

  console.warn(`⚠️  Saved date ${date.day}/${date.month}/${date.year} is invalid, clamping it`);
  const year = Math.max(1, date.year);
  const month = Math.min(12, Math.max(1, date.month));
  const day = Math.min(daysInMonth(month, year), Math.max(1, date.day));
  return { day, month, year };
}

function normalizeActiveEvent(raw: unknown): ActiveEventSnapshot | undefined {
  if (!isRecord(raw) || typeof raw.id !== 'string') return undefined;
  return { id: raw.id, daysRemaining: toInt(raw.daysRemaining, 1) };
}

function fromLegacy(legacy: LegacyCalendarBlock): CalendarData {
  return {
    schemaVersion: CALENDAR_SCHEMA_VERSION,
    date: normalizeDate({ day: legacy.day, month: legacy.month, year: legacy.year }),
    savedTotalTicks: Math.max(0, Math.trunc(legacy.totalTicks)),
    savedAt: new Date().toISOString(),
  };
}

function normalize(parsed: unknown): CalendarData {
  const raw: JsonRecord = isRecord(parsed) ? parsed : {};
  const loadedVersion = toInt(raw.schemaVersion, 1);
  const rawDate = raw.date;

  if (loadedVersion < CALENDAR_SCHEMA_VERSION || !isRecord(rawDate)) {
    console.log(`📦 Migrating calendar data from schema v${loadedVersion} to v${CALENDAR_SCHEMA_VERSION}...`);
    return fromLegacy({
      day: toInt(raw.day, 1),
      month: toInt(raw.month, 1),
      year: toInt(raw.year, 1),
      totalTicks: toInt(raw.totalTicks, 0),
    });
  }

  return {
    schemaVersion: CALENDAR_SCHEMA_VERSION,
    date: normalizeDate(rawDate),
    savedTotalTicks: Math.max(0, toInt(raw.savedTotalTicks, 0)),
    activeEvent: normalizeActiveEvent(raw.activeEvent),
    savedAt: typeof raw.savedAt === 'string' ? raw.savedAt : new Date(0).toISOString(),
  };
}

export async function saveCalendarData(dataPath: string, data: CalendarData): Promise<void> {
  await mkdir(path.dirname(dataPath), { recursive: true });
  await writeFile(dataPath, JSON.stringify(data, null, 2), 'utf8');
}

/**
 * Loads the saved calendar. When no data file exists yet but the settings
 * still carry the old date block, that block is migrated into a new data
 * file once; afterwards the data file wins.
 */
export async function loadCalendarData(
  dataPath: string,
  legacy?: LegacyCalendarBlock
): Promise<CalendarData | null> {
  try {
    const parsed = parseJsonFile(await readFile(dataPath, 'utf8'), dataPath);
    if (parsed !== undefined) return normalize(parsed);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
  }

  if (!legacy) return null;

  console.log(`📦 Migrating calendar date from settings into ${dataPath}...`);
  const migrated = fromLegacy(legacy);
  await saveCalendarData(dataPath, migrated);
  return migrated;
}

export async function getModifiedTime(file: string): Promise<number | null> {
  try {
    const stats = await stat(file);
    return stats.mtime.getTime();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}
