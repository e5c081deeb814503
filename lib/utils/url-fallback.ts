// Alternate URLs for media served from a transformation CDN, i.e. URLs shaped
// like `https://cdn.example.com/<account>/video/upload/<transforms>/<public id>.m3u8`

const QUALITY_STEPS: ReadonlyArray<readonly [string, string]> = [
  ['sp_hd', 'sp_sd'],
  ['sp_sd', 'sp_auto'],
  ['q_auto:best', 'q_auto:good'],
  ['q_auto:good', 'q_auto:eco'],
  ['q_auto:eco', 'q_auto:low'],
];

const MINIMAL_TRANSFORMATION = 'q_auto:low,f_auto';
const STREAM_EXTENSION = /\.(m3u8|mp4)$/i;

interface UploadPath {
  url: URL;
  /** Path segments up to and including `upload`. */
  prefix: string[];
  publicId: string[];
}

// Transformation (`q_auto:good,sp_hd`), version (`v1699`) and signature (`s--abc--`) segments
const isTransformationSegment = (segment: string): boolean =>
  /^[a-z]{1,3}_[^/]*$/.test(segment) || /^v\d+$/.test(segment) || /^s--.+--$/.test(segment);

const splitUploadPath = (rawUrl: string): UploadPath | undefined => {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return undefined;
  }

  const segments = url.pathname.split('/').filter(Boolean);
  const uploadIndex = segments.indexOf('upload');
  if (uploadIndex === -1) return undefined;

  const rest = segments.slice(uploadIndex + 1);
  if (rest.length === 0) return undefined;

  // The last segment is always part of the public id
  let firstIdSegment = 0;
  while (firstIdSegment < rest.length - 1 && isTransformationSegment(rest[firstIdSegment])) {
    firstIdSegment++;
  }

  return {
    url,
    prefix: segments.slice(0, uploadIndex + 1),
    publicId: rest.slice(firstIdSegment),
  };
};

const buildUrl = ({ url, prefix }: UploadPath, tail: string[]): string =>
  `${url.origin}/${[...prefix, ...tail].join('/')}${url.search}`;

/**
 * Step the streaming profile or quality setting down one notch.
 */
export function reducedQualityVariant(url: string): string | undefined {
  for (const [from, to] of QUALITY_STEPS) {
    if (url.includes(from)) {
      return url.split(from).join(to);
    }
  }
  return url.includes('sp_auto') ? withoutStreamingProfile(url) : undefined;
}

const withoutStreamingProfile = (rawUrl: string): string | undefined => {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return undefined;
  }

  const segments = url.pathname.split('/').filter(Boolean);
  const kept = segments
    .map((segment) =>
      segment
        .split(',')
        .filter((part) => part !== 'sp_auto')
        .join(',')
    )
    .filter((segment) => segment !== '');
  const candidate = `${url.origin}/${kept.join('/')}${url.search}`;
  return candidate !== rawUrl ? candidate : undefined;
};

/**
 * Same asset with every transformation removed, letting the CDN pick defaults.
 */
export function canonicalUrl(url: string): string | undefined {
  const parts = splitUploadPath(url);
  if (!parts) return undefined;

  const last = parts.publicId.length - 1;
  const publicId = parts.publicId.map((segment, index) =>
    index === last ? segment.replace(STREAM_EXTENSION, '') : segment
  );
  const candidate = buildUrl(parts, publicId);
  return candidate !== url ? candidate : undefined;
}

/**
 * Same asset at the lowest automatic quality.
 */
export function minimalQualityVariant(url: string): string | undefined {
  const parts = splitUploadPath(url);
  if (!parts) return undefined;

  const candidate = buildUrl(parts, [MINIMAL_TRANSFORMATION, ...parts.publicId]);
  return candidate !== url ? candidate : undefined;
}

/**
 * Ordered alternates to try after a 400/401: reduced quality, then the
 * untransformed asset, then the minimal-quality asset.
 */
export function buildFallbackChain(url: string): string[] {
  const chain: string[] = [];
  for (const candidate of [reducedQualityVariant(url), canonicalUrl(url), minimalQualityVariant(url)]) {
    if (candidate && candidate !== url && !chain.includes(candidate)) {
      chain.push(candidate);
    }
  }
  return chain;
}
