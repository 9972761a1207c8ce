export function getSlowRequestDurationBucket(durationMs: number): string | null {
  if (durationMs > 10_000) return '>10s';
  if (durationMs > 5_000) return '>5s';
  if (durationMs > 2_000) return '>2s';
  if (durationMs > 1_000) return '>1s';
  return null;
}

export function getHttpStatusCodeClass(statusCode: number): string {
  if (statusCode >= 200 && statusCode < 300) return '2xx';
  if (statusCode >= 300 && statusCode < 400) return '3xx';
  // 4xx codes are reported as-is, 401 and 403 mean different things to an operator
  if (statusCode >= 400 && statusCode < 500) return statusCode.toString();
  if (statusCode >= 500) return '5xx';
  return 'unknown';
}

/**
 * Builds a function that maps a request path onto a low-cardinality metric label.
 * Segments listed in `knownSegments` are kept, anything else is replaced by a
 * placeholder named after the segment before it.
 */
export function createApiMethodExtractor(knownSegments: string[]) {
  const knownSegmentsSet = new Set(knownSegments);

  return (path: string, httpMethod: string): string => {
    const [pathWithoutQueryString] = path.split('?');
    const segments = pathWithoutQueryString?.split('/').filter(Boolean) ?? [];
    const normalizedSegments: string[] = [];
    let previousSegment: string | null = null;

    for (const segment of segments) {
      if (knownSegmentsSet.has(segment)) {
        normalizedSegments.push(segment);
        previousSegment = segment;
      } else {
        const paramName = previousSegment
          ? `{${previousSegment.replace(/s$/, '')}Id}`
          : '[unknown]';
        normalizedSegments.push(paramName);
        previousSegment = null;
      }
    }

    return `${httpMethod}:/${normalizedSegments.join('/')}`;
  };
}
