import { useEffect, useRef, useState } from 'react';
import type { PreloadScheduler, PreloadSchedulerStats } from '@/lib/preload-scheduler';

interface PreloadConfig {
  enabled?: boolean; // Whether preloading is enabled (default: true)
}

/**
 * Hook to prepare players around the active feed item
 * Reports every change of the active index to the scheduler and stops
 * preloading when the feed unmounts or preloading is switched off
 *
 * @param scheduler - Preload scheduler of the media engine
 * @param activeIndex - Current active video index
 * @param config - Preload configuration
 */
export const useFeedPreload = (
  scheduler: PreloadScheduler,
  activeIndex: number,
  config: PreloadConfig = {}
): PreloadSchedulerStats => {
  const { enabled = true } = config;
  const [stats, setStats] = useState<PreloadSchedulerStats>(() => scheduler.getStats());
  const lastIndexRef = useRef<number | null>(null);

  useEffect(() => {
    const refresh = () => setStats(scheduler.getStats());
    const unsubscribers = [scheduler.on('preloaded', refresh), scheduler.on('failed', refresh)];
    return () => {
      unsubscribers.forEach((unsubscribe) => unsubscribe());
    };
  }, [scheduler]);

  useEffect(() => {
    if (!enabled || activeIndex < 0) return;
    if (lastIndexRef.current === activeIndex) return;

    lastIndexRef.current = activeIndex;
    scheduler.onViewportChanged(activeIndex);
    setStats(scheduler.getStats());
  }, [scheduler, activeIndex, enabled]);

  useEffect(() => {
    if (!enabled) return;
    return () => {
      // User left the feed (or preloading was switched off)
      scheduler.stop();
      lastIndexRef.current = null;
    };
  }, [scheduler, enabled]);

  return stats;
};
