/**
 * Seasonal Calendar - Standalone Entry Point
 *
 * Runs the calendar against an in-process host world. Operator commands are
 * read from stdin:
 *   calendar <help|set|reload|event> ...   calendar command as an operator
 *   sleep / wake                           a single player goes to bed or gets up
 *   weather <clear|rain|thunder>           any other line goes to the host
 */

import { createInterface } from 'readline';
import { CalendarApp } from './app.ts';
import { CalendarCommand } from './commands.ts';
import { loadConfig } from './config.ts';
import { SimulatedHost, SimulatedWorld } from './host.ts';
import { Logger } from './logging.ts';
import type { StatusLine, StatusRenderer } from './display.ts';
import type { HostPlayer } from './host.ts';

const config = loadConfig();

class ConsoleHost extends SimulatedHost {
  override broadcast(message: string): void {
    super.broadcast(message);
    console.log(`📣 ${message}`);
  }
}

const consoleRenderer: StatusRenderer = {
  render(status: StatusLine) {
    const bar = '█'.repeat(Math.round(status.progress * 20)).padEnd(20, '░');
    process.stdout.write(`\r${status.title} ${bar}`);
  },
  clear() {
    process.stdout.write('\n');
  },
};

const world = new SimulatedWorld();
const operator: HostPlayer = { name: 'operator', sleeping: false, sleepingIgnored: false };
world.setPlayers([operator]);

const host = new ConsoleHost(world);
const app = new CalendarApp({
  config,
  host,
  renderer: consoleRenderer,
  logger: new Logger(config.logDir),
});
const command = new CalendarCommand(app);

// ============================================================================
// PROCESS HANDLERS (graceful shutdown)
// ============================================================================

process.on('unhandledRejection', (reason, promise) => {
  console.error('🚨 UNHANDLED REJECTION at:', promise, 'reason:', reason);
});

async function gracefulShutdown(signal: string): Promise<void> {
  console.log(`\n📡 Received ${signal}, shutting down gracefully...`);
  try {
    await app.disable();
  } catch (error) {
    console.error('Failed to shut down cleanly:', error);
    process.exit(1);
  }
  process.exit(0);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// ============================================================================
// CONSOLE INPUT
// ============================================================================

async function handleLine(line: string): Promise<void> {
  const [name, ...args] = line.trim().replace(/^\//, '').split(/\s+/);
  if (!name) return;

  switch (name.toLowerCase()) {
    case 'calendar': {
      const replies = await command.execute({ name: operator.name, isOperator: true }, args);
      for (const reply of replies) console.log(reply);
      return;
    }
    case 'sleep':
      operator.sleeping = true;
      app.systems?.sleep.onBedEnter();
      if (!world.daylightCycle) return;
      world.skipToMorning();
      operator.sleeping = false;
      app.systems?.sleep.onBedLeave();
      return;
    case 'wake':
      operator.sleeping = false;
      app.systems?.sleep.onBedLeave();
      return;
    default:
      host.dispatchCommand(line.trim());
  }
}

async function main(): Promise<void> {
  console.log('📅 Seasonal Calendar');
  console.log(`   Data: ${config.dataDir}`);
  console.log(`   Logs: ${config.logDir}/events.log`);
  console.log(`   Clock interval: ${config.tickIntervalMs}ms`);

  await app.enable();

  const input = createInterface({ input: process.stdin });
  input.on('line', (line) => {
    handleLine(line).catch((error) => console.error('Command failed:', error));
  });
  input.on('close', () => void gracefulShutdown('EOF'));
}

main().catch((error) => {
  console.error('Fatal error in main:', error);
  process.exit(1);
});
