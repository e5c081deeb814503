// Shared domain types for the feed media engine

export type StreamType = 'hls' | 'raw';

/**
 * Feed item descriptor supplied by the data layer. The engine only reads it.
 */
export interface MediaItem {
  id: string;
  url: string;
  fallbackUrls: readonly string[];
  durationMs: number;
  aspectRatio: number;
  streamType?: StreamType;
}

export type QualityTier = 'high' | 'medium' | 'low' | 'very-low';

export type DeviceClass = 'high-end' | 'low-end';

export type PlaybackState =
  | 'uninitialized'
  | 'initializing'
  | 'ready'
  | 'playing'
  | 'paused'
  | 'error'
  | 'disposed';

/**
 * Read-only view of the feed owned by the data layer.
 */
export interface FeedSource {
  itemCount(): number;
  itemAt(index: number): MediaItem | undefined;
}

export interface PlayerSource {
  uri: string;
  mediaId: string;
  /** Bytes buffered through the progressive fetch cache, when the source is streamed. */
  stream?: AsyncIterable<Uint8Array>;
}

/**
 * Decode/playback handle created by the platform. Modelled on expo-video's player.
 */
export interface MediaPlayer {
  loop: boolean;
  muted: boolean;
  volume: number;
  load(): Promise<void>;
  play(): void;
  pause(): void;
  release(): void;
}

export interface PlayerFactory {
  create(source: PlayerSource): MediaPlayer;
}

// Payloads served by the metadata API and kept in the smart cache

export interface MediaPage {
  items: MediaItem[];
  page: number;
  hasMore: boolean;
}

export interface ProfileDocument {
  id: string;
  username: string;
  displayName?: string;
  avatarUrl?: string | null;
  mediaIds: string[];
}

export interface AdCreative {
  id: string;
  mediaUrl: string;
  clickUrl?: string;
  placement: string;
}

export interface AdList {
  items: AdCreative[];
}

export interface ApiResponse<T> {
  status: 'success' | 'error';
  message?: string;
  data: T;
}
