import { readFile } from 'fs/promises';
import path from 'path';
import { DEFAULTS_DIR, parseJsonFile } from './config.ts';

export type MessageTable = Record<string, string>;
export type Replacements = Record<string, string | number>;

const FALLBACK_LANGUAGE = 'en_US';

function toTable(raw: unknown, source: string): MessageTable {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    console.warn(`⚠️  Language file ${source} is not an object, ignoring it`);
    return {};
  }
  const table: MessageTable = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') table[key] = value;
  }
  return table;
}

async function readTable(file: string): Promise<MessageTable | null> {
  try {
    const parsed = parseJsonFile(await readFile(file, 'utf8'), file);
    return parsed === undefined ? {} : toTable(parsed, file);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * User-facing strings. Keys missing from the chosen language fall back to the
 * bundled English table, then to the missing-translation template.
 */
export class Messages {
  constructor(private readonly table: MessageTable) {}

  static async load(langDir: string, language: string): Promise<Messages> {
    const bundled = (await readTable(path.join(DEFAULTS_DIR, 'lang', `${FALLBACK_LANGUAGE}.json`))) ?? {};
    let selected = await readTable(path.join(langDir, `${language}.json`));
    if (!selected) {
      selected = await readTable(path.join(DEFAULTS_DIR, 'lang', `${language}.json`));
    }
    if (!selected) {
      console.warn(`⚠️  Language file '${language}.json' not found. Defaulting to '${FALLBACK_LANGUAGE}.json'.`);
      selected = {};
    }
    return new Messages({ ...bundled, ...selected });
  }

  get(key: string, replacements: Replacements = {}): string {
    const template = this.table[key];
    if (template === undefined) {
      const missing = this.table['errors.missing-translation'] ?? 'Missing translation for: {key}';
      return missing.split('{key}').join(key);
    }
    let message = template;
    for (const [placeholder, value] of Object.entries(replacements)) {
      message = message.split(`{${placeholder}}`).join(String(value));
    }
    return message;
  }
}
