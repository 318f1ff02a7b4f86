/**
 * Kite Site Registry
 *
 * Static definitions of each kite site and the reference station used to
 * compute its pressure gradient (reference - site). The gradient between an
 * outer coastal station and the inlet drives the afternoon thermal.
 *
 * All timestamps for a site are requested and handled in the site's IANA
 * timezone, so both station series share one local clock.
 */

import type { Coordinates } from '@/types/kite';

// ============================================================
// TYPES
// ============================================================

export interface KiteSite {
  id: string;
  name: string;
  timezone: string;
  site: Coordinates;
  reference: {
    name: string;
    coordinates: Coordinates;
  };
}

// ============================================================
// SITES (STATIC)
// ============================================================

export const DEFAULT_SITE_ID = 'squamish';

/**
 * Sources:
 * - Squamish Spit: 49.7016° N, 123.1558° W
 * - Vancouver International (YVR): 49.1967° N, 123.1815° W
 */
export const KITE_SITES: Readonly<Record<string, KiteSite>> = {
  squamish: {
    id: 'squamish',
    name: 'Squamish Spit',
    timezone: 'America/Vancouver',
    site: { lat: 49.7016, lon: -123.1558 },
    reference: {
      name: 'Vancouver International (YVR)',
      coordinates: { lat: 49.1967, lon: -123.1815 },
    },
  },
} as const;

// ============================================================
// LOOKUP FUNCTIONS
// ============================================================

/**
 * Get a site by ID. Returns null if the site is not registered.
 */
export function getKiteSite(siteId: string): KiteSite | null {
  return KITE_SITES[siteId] ?? null;
}

/**
 * Get the default site
 *
 * FATAL GUARD: the default site must always be registered.
 */
export function getDefaultSite(): KiteSite {
  const site = getKiteSite(DEFAULT_SITE_ID);
  if (!site) {
    throw new Error(
      `[SITE_REGISTRY] FATAL: default site "${DEFAULT_SITE_ID}" is not registered in KITE_SITES.`
    );
  }
  return site;
}

/**
 * Get all registered site IDs
 */
export function getRegisteredSiteIds(): string[] {
  return Object.keys(KITE_SITES);
}
