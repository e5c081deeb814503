import type { AxiosInstance } from 'axios';
import type { AdCreative, AdList, ApiResponse, MediaItem, MediaPage, ProfileDocument } from '@/types';
import { API_BASE_URL, DEBUG_LOGS } from './config';
import { CacheCategory, cacheKey } from './cache-keys';
import { NetworkError } from './errors';
import type { FeedCache } from './smart-cache';
import { getFileUrl, toMediaItem, type RawPost } from './utils/file-url';
import { toNetworkError } from './utils/network-error-handler';

interface RawPagination {
  currentPage?: number;
  hasNext?: boolean;
}

interface RawUser {
  id: string | number;
  username: string;
  display_name?: string | null;
  profile_picture?: string | null;
  posts?: Array<{ id: string | number }>;
}

interface RawAd {
  id: string | number;
  mediaUrl?: string | null;
  video_url?: string | null;
  clickUrl?: string | null;
  placement?: string;
}

export interface FeedApiOptions {
  client: AxiosInstance;
  cache: FeedCache;
  baseUrl?: string;
}

export interface FeedApi {
  getFeedPage(page?: number, limit?: number, options?: { forceRefresh?: boolean }): Promise<MediaPage>;
  getProfile(userId: string): Promise<ProfileDocument>;
  getAds(placement: string): Promise<AdList>;
  invalidateFeed(): Promise<void>;
}

/**
 * Unwrap the API envelope. Anything but a success status is a failure so the
 * cache can fall back to what it already has.
 */
async function request<T>(client: AxiosInstance, url: string): Promise<T> {
  let body: ApiResponse<T>;
  try {
    const response = await client.get<ApiResponse<T>>(url);
    body = response.data;
  } catch (error) {
    throw toNetworkError(error, url);
  }

  if (body.status !== 'success') {
    throw new NetworkError(body.message || `Request failed: ${url}`, { url });
  }
  return body.data;
}

/**
 * Metadata calls the feed makes, read through the smart cache.
 */
export function createFeedApi({ client, cache, baseUrl = API_BASE_URL }: FeedApiOptions): FeedApi {
  return {
    getFeedPage: (page = 1, limit = 10, options = {}) =>
      cache.get(
        cacheKey(CacheCategory.MediaList, 'feed', page, limit),
        async () => {
          const data = await request<{ posts?: RawPost[]; pagination?: RawPagination }>(
            client,
            `/api/posts/all?page=${page}&limit=${limit}`
          );
          const items = (data.posts ?? [])
            .map((post) => toMediaItem(post, baseUrl))
            .filter((item): item is MediaItem => item !== null);

          if (data.posts?.length && items.length === 0 && DEBUG_LOGS) {
            console.log(`📭 [FeedApi] Page ${page} has no playable posts yet`);
          }
          return { items, page, hasMore: data.pagination?.hasNext ?? items.length === limit };
        },
        { forceRefresh: options.forceRefresh }
      ),

    getProfile: (userId) =>
      cache.get(cacheKey(CacheCategory.Profile, userId), async () => {
        const user = await request<RawUser>(client, `/api/users/${encodeURIComponent(userId)}`);
        return {
          id: String(user.id),
          username: user.username,
          displayName: user.display_name ?? undefined,
          avatarUrl: getFileUrl(user.profile_picture, baseUrl),
          mediaIds: (user.posts ?? []).map((post) => String(post.id)),
        };
      }),

    getAds: (placement) =>
      cache.get(cacheKey(CacheCategory.AdList, placement), async () => {
        const data = await request<{ ads?: RawAd[] }>(client, `/api/ads/serve?placement=${encodeURIComponent(placement)}`);
        const items: AdCreative[] = [];
        for (const ad of data.ads ?? []) {
          const mediaUrl = getFileUrl(ad.mediaUrl || ad.video_url, baseUrl);
          if (!mediaUrl) continue;
          items.push({
            id: String(ad.id),
            mediaUrl,
            clickUrl: ad.clickUrl ?? undefined,
            placement: ad.placement ?? placement,
          });
        }
        return { items };
      }),

    invalidateFeed: () => cache.invalidate({ category: CacheCategory.MediaList }),
  };
}
