/** Containment check over a raw response body; model lookups and keyword checks both use it. */
export function containsText(body: string, needle: string): boolean {
  if (needle.length === 0) return false;
  return body.includes(needle);
}

export const HEALTHY_BODY = '{"status":"OK"}';

export function isHealthyBody(body: string): boolean {
  return body.trim() === HEALTHY_BODY;
}
