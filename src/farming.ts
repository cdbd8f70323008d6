import type { FarmingSettings } from './config.ts';
import type { Random } from './rng.ts';
import type { Season } from './types.ts';

/**
 * Decides whether a crop may grow in the current season. Crops listed for
 * the season always grow; anything else grows with that season's
 * out-of-season chance.
 */
export class SeasonalFarming {
  private readonly crops: Record<Season, ReadonlySet<string>>;

  constructor(private readonly settings: FarmingSettings, knownCrops?: ReadonlySet<string>) {
    const load = (season: Season): ReadonlySet<string> => {
      const names = new Set<string>();
      for (const raw of settings.crops[season]) {
        const name = raw.toLowerCase();
        if (knownCrops && !knownCrops.has(name)) {
          console.warn(`⚠️  Unknown crop "${raw}" listed for ${season}, ignoring it`);
          continue;
        }
        names.add(name);
      }
      return names;
    };
    this.crops = {
      winter: load('winter'),
      spring: load('spring'),
      summer: load('summer'),
      autumn: load('autumn'),
    };
  }

  isInSeason(crop: string, season: Season): boolean {
    return this.crops[season].has(crop.toLowerCase());
  }

  shouldGrow(crop: string, season: Season, rng: Random): boolean {
    if (this.isInSeason(crop, season)) return true;
    return rng.chance(this.settings.outOfSeasonGrowthChance[season]);
  }
}
