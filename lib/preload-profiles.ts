import type { DeviceClass, QualityTier } from '@/types';

export interface PreloadProfile {
  name: string;
  /** Items after the visible one to prepare. */
  ahead: number;
  /** Items before the visible one to keep warm. */
  behind: number;
  /** Preload tasks allowed in flight at once. */
  concurrency: number;
}

export const PRELOAD_PROFILES = {
  aggressive: { name: 'aggressive', ahead: 3, behind: 1, concurrency: 3 },
  balanced: { name: 'balanced', ahead: 2, behind: 1, concurrency: 2 },
  lite: { name: 'lite', ahead: 1, behind: 1, concurrency: 2 },
} as const satisfies Record<string, PreloadProfile>;

export type PreloadProfileName = keyof typeof PRELOAD_PROFILES;

/**
 * Pick a profile from device and network: fast devices on fast networks
 * preload aggressively, slow devices or slow networks stay lite.
 */
export function selectPreloadProfile(conditions: { deviceClass: DeviceClass; tier: QualityTier }): PreloadProfile {
  const { deviceClass, tier } = conditions;
  if (deviceClass === 'low-end' || tier === 'low' || tier === 'very-low') {
    return PRELOAD_PROFILES.lite;
  }
  return tier === 'high' ? PRELOAD_PROFILES.aggressive : PRELOAD_PROFILES.balanced;
}
