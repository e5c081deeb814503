import { useEffect, useState } from 'react';
import type { QualityTier } from '@/types';
import type { NetworkQualityEstimator } from '@/lib/network-quality-estimator';

export interface NetworkQuality {
  tier: QualityTier;
  speed: number;
  isSlowNetwork: boolean;
}

export function useNetworkQuality(estimator: NetworkQualityEstimator): NetworkQuality {
  const [tier, setTier] = useState<QualityTier>(estimator.currentTier);
  const [speed, setSpeed] = useState(estimator.currentSpeed);

  useEffect(() => {
    // The tier may have moved between render and subscription
    setTier(estimator.currentTier);
    setSpeed(estimator.currentSpeed);

    return estimator.onTierChange((change) => {
      setTier(change.current);
      setSpeed(change.speed);
    });
  }, [estimator]);

  return { tier, speed, isSlowNetwork: tier === 'low' || tier === 'very-low' };
}
