export type NetworkStatus = 'online' | 'offline';

export type LinkType = 'wifi' | 'cellular' | 'ethernet' | 'unknown';

export interface NetworkStatusMeta {
  at: number;
  source?: string;
  message?: string;
  linkType?: LinkType;
}

type Listener = (status: NetworkStatus, meta?: NetworkStatusMeta) => void;

export interface NetworkStatusSignal {
  getStatus(): NetworkStatus;
  getLastChangedAt(): number;
  getLinkType(): LinkType;
  subscribe(listener: Listener): () => void;
  reportOffline(meta?: { source?: string; message?: string }): void;
  reportOnline(meta?: { source?: string; linkType?: LinkType }): void;
}

/**
 * Platform connectivity signal. The app shell feeds it from the OS
 * connectivity API and the api client reports what it observes on requests.
 */
export function createNetworkStatus(now: () => number = Date.now): NetworkStatusSignal {
  let currentStatus: NetworkStatus = 'online';
  let currentLinkType: LinkType = 'unknown';
  let lastChangedAt = now();
  const listeners = new Set<Listener>();

  function notify(meta?: NetworkStatusMeta) {
    listeners.forEach((fn) => {
      try {
        fn(currentStatus, meta);
      } catch (error) {
        console.warn('[NetworkStatus] Listener error:', error);
      }
    });
  }

  return {
    getStatus() {
      return currentStatus;
    },
    getLastChangedAt() {
      return lastChangedAt;
    },
    getLinkType() {
      return currentLinkType;
    },
    subscribe(listener) {
      listeners.add(listener);
      // immediately send current state so subscribers start consistent
      listener(currentStatus, { at: lastChangedAt, source: 'subscribe', linkType: currentLinkType });
      return () => {
        listeners.delete(listener);
      };
    },
    reportOffline(meta) {
      if (currentStatus === 'offline') return;
      currentStatus = 'offline';
      lastChangedAt = now();
      notify({ at: lastChangedAt, source: meta?.source, message: meta?.message });
    },
    reportOnline(meta) {
      const linkChanged = meta?.linkType !== undefined && meta.linkType !== currentLinkType;
      if (currentStatus === 'online' && !linkChanged) return;
      currentStatus = 'online';
      if (meta?.linkType) currentLinkType = meta.linkType;
      lastChangedAt = now();
      notify({ at: lastChangedAt, source: meta?.source, linkType: currentLinkType });
    },
  };
}
