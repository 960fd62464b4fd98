/** Static negotiation-style descriptor of a culture. All dimensions in [0, 1]. */
export interface CulturalProfile {
  readonly key: string;
  readonly name: string;
  readonly directness: number;
  readonly formality: number;
  readonly risk_tolerance: number;
}

export const CULTURE_KEYS = [
  'western_business',
  'east_asian',
  'middle_eastern',
  'latin_american',
  'northern_european',
  'south_asian',
] as const;

export type CultureKey = (typeof CULTURE_KEYS)[number];

export type DistanceTier = 'low' | 'medium' | 'high';

const profile = (p: CulturalProfile): CulturalProfile => Object.freeze(p);

export const CULTURAL_PROFILES: Readonly<Record<CultureKey, CulturalProfile>> = Object.freeze({
  western_business: profile({
    key: 'western_business',
    name: 'Western Business (USA/UK)',
    directness: 0.8,
    formality: 0.2,
    risk_tolerance: 0.7,
  }),
  east_asian: profile({
    key: 'east_asian',
    name: 'East Asian (Japan/China)',
    directness: 0.2,
    formality: 0.9,
    risk_tolerance: 0.1,
  }),
  middle_eastern: profile({
    key: 'middle_eastern',
    name: 'Middle Eastern (Gulf States)',
    directness: 0.4,
    formality: 0.7,
    risk_tolerance: 0.5,
  }),
  latin_american: profile({
    key: 'latin_american',
    name: 'Latin American (Brazil/Mexico)',
    directness: 0.5,
    formality: 0.5,
    risk_tolerance: 0.6,
  }),
  northern_european: profile({
    key: 'northern_european',
    name: 'Northern European (Germany/Nordics)',
    directness: 0.9,
    formality: 0.6,
    risk_tolerance: 0.3,
  }),
  south_asian: profile({
    key: 'south_asian',
    name: 'South Asian (India)',
    directness: 0.4,
    formality: 0.6,
    risk_tolerance: 0.5,
  }),
});

export const DEFAULT_CULTURE: CultureKey = 'western_business';

export function isCultureKey(key: string): key is CultureKey {
  return Object.prototype.hasOwnProperty.call(CULTURAL_PROFILES, key);
}

/** Look up a profile by key. Returns null for keys outside the catalogue. */
export function getCulturalProfile(key: string): CulturalProfile | null {
  return isCultureKey(key) ? CULTURAL_PROFILES[key] : null;
}

/**
 * Euclidean distance over (directness, formality, risk_tolerance), scaled to [0, 1].
 * Symmetric; distance(A, A) = 0.
 */
export function culturalDistance(a: CulturalProfile, b: CulturalProfile): number {
  const dd = a.directness - b.directness;
  const df = a.formality - b.formality;
  const dr = a.risk_tolerance - b.risk_tolerance;
  return Math.sqrt(dd * dd + df * df + dr * dr) / Math.sqrt(3);
}

/** low < 0.3 <= medium < 0.6 <= high */
export function distanceTier(distance: number): DistanceTier {
  if (distance < 0.3) return 'low';
  if (distance < 0.6) return 'medium';
  return 'high';
}
