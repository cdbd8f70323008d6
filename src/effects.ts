import type { ResourcePack } from './config.ts';
import type { Messages } from './messages.ts';
import type { Season } from './types.ts';

/** Notified once per season transition, and once at startup for the current season. */
export interface SeasonalEffects {
  handleSeasonChange(season: Season): void;
  stopAllEffects(): void;
}

export interface EffectHandle {
  stop(): void;
}

/** World-side renderer for seasonal visuals (snow, thaw, resource packs). */
export interface EffectRenderer {
  sendResourcePack(pack: ResourcePack): void;
  startSeasonEffect(season: Season): EffectHandle | null;
}

export interface SeasonalEffectsDeps {
  messages: Messages;
  resourcePacks: Readonly<Record<Season, ResourcePack>>;
  renderer?: EffectRenderer;
}

// A season without its own pack borrows spring's
export function resolveResourcePack(season: Season, packs: Readonly<Record<Season, ResourcePack>>): ResourcePack | null {
  const own = packs[season];
  if (own.url && own.sha1) return own;
  const fallback = packs.spring;
  if (fallback.url && fallback.sha1) return fallback;
  return null;
}

export class SeasonalEffectsManager implements SeasonalEffects {
  private active: EffectHandle | null = null;

  constructor(private readonly deps: SeasonalEffectsDeps) {}

  handleSeasonChange(season: Season): void {
    this.stopAllEffects();
    console.log(`🍂 ${this.deps.messages.get(`seasonal-effects.${season}-arrival`)}`);

    const renderer = this.deps.renderer;
    if (!renderer) return;

    const pack = resolveResourcePack(season, this.deps.resourcePacks);
    if (pack) {
      renderer.sendResourcePack(pack);
    } else {
      console.log(`📦 No resource pack set for ${season} or spring, none sent`);
    }
    this.active = renderer.startSeasonEffect(season);
  }

  stopAllEffects(): void {
    if (this.active) {
      this.active.stop();
      this.active = null;
    }
  }
}
