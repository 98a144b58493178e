/**
 * Preferences Store
 * Per-user place categories and language, in memory.
 */

import {
  PLACE_CATEGORIES,
  POI_CATEGORY_MAPPING,
  type PlaceCategory,
} from '../../config/guide.config.js';
import type { Lang } from '../i18n/index.js';

export type CategorySelection = Record<PlaceCategory, boolean>;

export interface UserPreferences {
  categories: CategorySelection;
  language: Lang;
}

export interface PreferencesUpdate {
  categories?: Partial<CategorySelection>;
  language?: Lang;
}

function defaultCategories(): CategorySelection {
  return {
    nature: true,
    religion: true,
    culture: true,
    history: true,
    must_visit: true,
  };
}

export class PreferencesStore {
  private prefs = new Map<string, UserPreferences>();

  /** Stored preferences, or the defaults (everything enabled, English) */
  get(userId: string): UserPreferences {
    const stored = this.prefs.get(userId);
    return {
      categories: { ...(stored?.categories ?? defaultCategories()) },
      language: stored?.language ?? 'en',
    };
  }

  update(userId: string, update: PreferencesUpdate): UserPreferences {
    const current = this.get(userId);
    const next: UserPreferences = {
      categories: { ...current.categories },
      language: update.language ?? current.language,
    };

    for (const category of PLACE_CATEGORIES) {
      const value = update.categories?.[category];
      if (value !== undefined) {
        next.categories[category] = value;
      }
    }

    this.prefs.set(userId, next);
    return this.get(userId);
  }

  toggle(userId: string, category: PlaceCategory): UserPreferences {
    const categories: Partial<CategorySelection> = {};
    categories[category] = !this.get(userId).categories[category];
    return this.update(userId, { categories });
  }

  getLanguage(userId: string): Lang {
    return this.prefs.get(userId)?.language ?? 'en';
  }

  enabledCategories(userId: string): PlaceCategory[] {
    const { categories } = this.get(userId);
    return PLACE_CATEGORIES.filter((category) => categories[category]);
  }

  /**
   * True only when the user saved preferences with every category off
   */
  hasDisabledAllCategories(userId: string): boolean {
    return this.prefs.has(userId) && this.enabledCategories(userId).length === 0;
  }

  /**
   * Provider place types for the enabled categories, first occurrence order.
   * May include types the search layer does not support; it filters them.
   */
  selectedPlaceTypes(userId: string): string[] {
    const types: string[] = [];
    for (const category of this.enabledCategories(userId)) {
      for (const type of POI_CATEGORY_MAPPING[category]) {
        if (!types.includes(type)) {
          types.push(type);
        }
      }
    }
    return types;
  }
}
