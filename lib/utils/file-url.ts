import { API_BASE_URL } from '@/lib/config';
import type { MediaItem, StreamType } from '@/types';

/**
 * Post as returned by the feed API. Only the media fields are described.
 */
export interface RawPost {
  id: string | number;
  type?: string;
  fullUrl?: string | null;
  video_url?: string | null;
  videoUrl?: string | null;
  hls_url?: string | null;
  hlsReady?: boolean;
  processing_status?: 'pending' | 'processing' | 'completed' | 'failed' | null;
  streamType?: StreamType | null;
  fallback_urls?: string[] | null;
  duration?: number | null;
  aspect_ratio?: number | null;
}

/**
 * Converts a relative file path from the API to a full URL
 *
 * @param relativePath - The relative path from API (e.g., "/uploads/filename.mp4")
 * @returns Full URL or null if path is invalid
 *
 * @example
 * getFileUrl("/uploads/file.mp4")
 * // Returns: "http://localhost:3000/uploads/file.mp4"
 *
 * getFileUrl("https://example.com/file.jpg")
 * // Returns: "https://example.com/file.jpg" (already full URL)
 */
export function getFileUrl(relativePath: string | null | undefined, baseUrl: string = API_BASE_URL): string | null {
  if (!relativePath || relativePath.trim() === '') {
    return null;
  }

  // If already a full URL (starts with http), return as-is
  if (relativePath.startsWith('http://') || relativePath.startsWith('https://')) {
    return relativePath;
  }

  if (relativePath.startsWith('/')) {
    return `${baseUrl}${relativePath}`;
  }

  // If it's a filename without path, assume it's in /uploads/
  return `${baseUrl}/uploads/${relativePath.replace(/^uploads\//, '')}`;
}

/**
 * Check if a URL is an HLS playlist (.m3u8)
 */
export function isHlsUrl(url: string | null | undefined): boolean {
  if (!url) return false;
  return url.toLowerCase().includes('.m3u8');
}

/**
 * Check if a post's video is HLS-ready (adaptive streaming available)
 */
export function isHlsReady(post: RawPost): boolean {
  return post.hlsReady === true || (!!post.hls_url && post.processing_status === 'completed');
}

/**
 * Get the stream type for a post, inferring it when the API leaves it out
 */
export function getStreamType(post: RawPost): StreamType | null {
  if (post.streamType) {
    return post.streamType;
  }
  if (isHlsReady(post)) {
    return 'hls';
  }
  if (post.video_url || post.videoUrl) {
    return 'raw';
  }
  return null;
}

// Markers of an already reduced rendition
const DEGRADED_MARKERS = ['q_auto:low', 'q_auto:eco', 'sp_sd', '_low.', '/low/'];

export function isDegradedUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return DEGRADED_MARKERS.some((marker) => lower.includes(marker));
}

/** Whether a URL of this item points at an adaptive playlist. */
export function isAdaptiveSource(item: MediaItem, url: string): boolean {
  return isHlsUrl(url) || (url === item.url && item.streamType === 'hls');
}

/**
 * Every distinct URL of an item ordered for playback: adaptive playlists
 * first, then progressive files, then degraded renditions. Order within a
 * group follows the item.
 */
export function rankPlaybackUrls(item: MediaItem): string[] {
  const urls = [...new Set([item.url, ...item.fallbackUrls].filter((url) => url.trim() !== ''))];
  const rank = (url: string): number => {
    if (isDegradedUrl(url)) return 2;
    return isAdaptiveSource(item, url) ? 0 : 1;
  };
  return urls
    .map((url, position) => ({ url, position, rank: rank(url) }))
    .sort((a, b) => a.rank - b.rank || a.position - b.position)
    .map(({ url }) => url);
}

/**
 * Normalize a feed post into the engine's media descriptor. Returns null for
 * posts with nothing playable yet (still processing, or not a video).
 */
export function toMediaItem(post: RawPost, baseUrl: string = API_BASE_URL): MediaItem | null {
  if (post.type !== undefined && post.type !== 'video') return null;

  const streamType = getStreamType(post);
  const hlsUrl = streamType === 'hls' ? getFileUrl(post.hls_url || post.fullUrl, baseUrl) : null;
  const rawUrl = getFileUrl(post.video_url || post.videoUrl, baseUrl);
  const primary = hlsUrl ?? rawUrl ?? getFileUrl(post.fullUrl, baseUrl);
  if (!primary) return null;

  const fallbacks = [rawUrl, ...(post.fallback_urls ?? []).map((url) => getFileUrl(url, baseUrl))].filter(
    (url): url is string => !!url && url !== primary
  );

  return {
    id: String(post.id),
    url: primary,
    fallbackUrls: fallbacks,
    durationMs: post.duration ? Math.round(post.duration * 1000) : 0,
    aspectRatio: post.aspect_ratio ?? 9 / 16,
    streamType: primary === hlsUrl || isHlsUrl(primary) ? 'hls' : 'raw',
  };
}
