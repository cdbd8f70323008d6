/**
 * EVENT CATALOG
 *
 * Event definitions read from events.json. Definitions are frozen after load
 * and a reload builds a whole new catalog. Iteration is always in id order,
 * which is the order the scheduler tries events in.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { DEFAULTS_DIR, isSeason, parseJsonFile } from './config.ts';
import type { EventDefinition, EventKind, Season } from './types.ts';

const KIND_BY_TYPE: Record<string, EventKind> = {
  FIXED_DATE: 'fixed-date',
  ANNUAL: 'annual',
  RANDOM: 'random',
};

/**
 * Splits a "D/M" or "D/M/Y" trigger into numbers. Anything else, including
 * the wrong number of parts, yields null.
 */
export function parseTriggerDate(spec: string, parts: 2 | 3): number[] | null {
  const pieces = spec.split('/');
  if (pieces.length !== parts) return null;
  if (!pieces.every((piece) => /^\d+$/.test(piece))) return null;
  return pieces.map(Number);
}

function triggerParts(kind: EventKind): 2 | 3 | null {
  switch (kind) {
    case 'fixed-date':
      return 3;
    case 'annual':
      return 2;
    case 'random':
      return null;
  }
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function parseDefinition(rawId: string, data: JsonRecord): EventDefinition | null {
  const id = rawId.toLowerCase();
  const type = typeof data.type === 'string' ? data.type.toUpperCase().replace(/-/g, '_') : 'RANDOM';
  const kind = KIND_BY_TYPE[type];
  if (!kind) {
    console.warn(`⚠️  Event '${id}' has unknown type "${String(data.type)}", skipping it`);
    return null;
  }

  const triggerSpec = typeof data.triggerDate === 'string' ? data.triggerDate : '';
  const parts = triggerParts(kind);
  if (parts !== null && parseTriggerDate(triggerSpec, parts) === null) {
    console.warn(`⚠️  Event '${id}' has malformed trigger date "${triggerSpec}", it will never start on its own`);
  }

  const rawConditions = data.conditions;
  const conditions: JsonRecord = isRecord(rawConditions) ? rawConditions : {};
  let chancePercent = typeof conditions.chance === 'number' ? Math.trunc(conditions.chance) : 0;
  if (chancePercent < 0 || chancePercent > 100) {
    console.warn(`⚠️  Event '${id}' chance ${chancePercent} is outside 0-100, clamping it`);
    chancePercent = Math.min(100, Math.max(0, chancePercent));
  }

  const eligibleSeasons = new Set<Season>();
  for (const name of stringList(conditions.seasons)) {
    const season = name.toLowerCase();
    if (isSeason(season)) {
      eligibleSeasons.add(season);
    } else {
      console.warn(`⚠️  Event '${id}' lists unknown season "${name}", ignoring it`);
    }
  }

  let durationDays = typeof data.durationDays === 'number' ? Math.trunc(data.durationDays) : 1;
  if (durationDays !== -1 && durationDays < 1) {
    console.warn(`⚠️  Event '${id}' has invalid duration ${durationDays}, using 1 day`);
    durationDays = 1;
  }

  return Object.freeze({
    id,
    displayName: typeof data.displayName === 'string' ? data.displayName : 'Unnamed Event',
    kind,
    triggerSpec,
    chancePercent,
    eligibleSeasons,
    durationDays,
    startActions: Object.freeze(stringList(data.startCommands)),
    endActions: Object.freeze(stringList(data.endCommands)),
  });
}

export function parseCatalog(raw: unknown): EventCatalog {
  const root: JsonRecord = isRecord(raw) ? raw : {};
  const section = root.events;
  if (!isRecord(section)) return new EventCatalog([]);

  const definitions: EventDefinition[] = [];
  for (const [id, data] of Object.entries(section)) {
    if (!isRecord(data)) {
      console.warn(`⚠️  Event '${id}' is not an object, skipping it`);
      continue;
    }
    const definition = parseDefinition(id, data);
    if (definition) definitions.push(definition);
  }
  return new EventCatalog(definitions);
}

export class EventCatalog {
  private readonly byId = new Map<string, EventDefinition>();
  private readonly ordered: readonly EventDefinition[];

  constructor(definitions: readonly EventDefinition[]) {
    for (const definition of definitions) {
      if (this.byId.has(definition.id)) {
        console.warn(`⚠️  Duplicate event id '${definition.id}', keeping the last definition`);
      }
      this.byId.set(definition.id, definition);
    }
    this.ordered = [...this.byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  get size(): number {
    return this.ordered.length;
  }

  get(id: string): EventDefinition | undefined {
    return this.byId.get(id.toLowerCase());
  }

  list(): readonly EventDefinition[] {
    return this.ordered;
  }
}

export async function loadCatalog(eventsPath: string): Promise<EventCatalog> {
  let raw: string;
  try {
    raw = await readFile(eventsPath, 'utf8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
    raw = await readFile(path.join(DEFAULTS_DIR, 'events.json'), 'utf8');
    await mkdir(path.dirname(eventsPath), { recursive: true });
    await writeFile(eventsPath, raw, 'utf8');
  }
  const catalog = parseCatalog(parseJsonFile(raw, eventsPath));
  console.log(`📜 Loaded ${catalog.size} events from ${eventsPath}`);
  return catalog;
}
