export const CORS_ALLOW_METHODS = 'GET, OPTIONS';
export const CORS_ALLOW_HEADERS = 'Content-Type';

/**
 * Origin to echo in Access-Control-Allow-Origin.
 * No allow-list means any origin. A listed (or wildcard-listed) origin is echoed
 * back; anything else gets the first configured origin, which browsers reject.
 */
export function resolveAllowedOrigin(allowList: readonly string[], requestOrigin: string | undefined): string {
  if (allowList.length === 0) return '*';
  if (requestOrigin && (allowList.includes(requestOrigin) || allowList.includes('*'))) {
    return requestOrigin;
  }
  return allowList[0];
}
