import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Messages } from '../src/messages.ts';
import { makeTempDir, removeTempDir } from './helpers.ts';

describe('Messages', () => {
  it('substitutes every placeholder occurrence', () => {
    const messages = new Messages({ greet: '{name}, {name}! Day {day}.' });
    expect(messages.get('greet', { name: 'Ada', day: 3 })).toBe('Ada, Ada! Day 3.');
  });

  it('leaves placeholders without a replacement alone', () => {
    const messages = new Messages({ greet: 'Hello {name}' });
    expect(messages.get('greet')).toBe('Hello {name}');
  });

  it('answers a missing key with the missing-translation template', () => {
    const messages = new Messages({ 'errors.missing-translation': 'No text for {key}' });
    expect(messages.get('nope.key')).toBe('No text for nope.key');
    expect(new Messages({}).get('nope.key')).toBe('Missing translation for: nope.key');
  });
});

describe('Messages.load', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('loads the bundled English table', async () => {
    const messages = await Messages.load(dir, 'en_US');
    expect(messages.get('calendar.new-day', { date: '1 January 1' })).toBe('A new day dawns! Date: 1 January 1');
  });

  it('falls back to English for keys a language lacks', async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, 'fr_FR.json'), JSON.stringify({ 'seasons.winter': 'Hiver' }), 'utf8');

    const messages = await Messages.load(dir, 'fr_FR');

    expect(messages.get('seasons.winter')).toBe('Hiver');
    expect(messages.get('seasons.spring')).toBe('Spring');
  });

  it('ships an Italian table', async () => {
    const messages = await Messages.load(dir, 'it_IT');

    expect(messages.get('seasons.winter')).toBe('Inverno');
    expect(messages.get('commands.reload-success')).toBe('Calendario ricaricato.');
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('uses English when a language file is not valid JSON', async () => {
    await writeFile(path.join(dir, 'de_DE.json'), '{ "seasons.winter": ', 'utf8');

    const messages = await Messages.load(dir, 'de_DE');

    expect(messages.get('seasons.winter')).toBe('Winter');
  });

  it('warns and uses English for an unknown language', async () => {
    const messages = await Messages.load(dir, 'xx_XX');

    expect(console.warn).toHaveBeenCalledWith("⚠️  Language file 'xx_XX.json' not found. Defaulting to 'en_US.json'.");
    expect(messages.get('seasons.summer')).toBe('Summer');
  });
});
