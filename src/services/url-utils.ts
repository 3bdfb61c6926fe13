/**
 * URL helpers for watch/playlist URLs.
 */

const PLACEHOLDER_BASE = "http://placeholder.invalid";

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Query parameters of a URL, also for input without a scheme
 * ("example.com/watch?v=abc").
 */
function queryOf(url: string): URLSearchParams | null {
  const parsed = parseUrl(url) ?? parseUrlWithBase(url);
  return parsed ? parsed.searchParams : null;
}

function parseUrlWithBase(url: string): URL | null {
  try {
    return new URL(url, PLACEHOLDER_BASE);
  } catch {
    return null;
  }
}

function hasValue(query: URLSearchParams, key: string): boolean {
  return query.getAll(key).some((v) => v !== "");
}

/**
 * Remove all whitespace, including whitespace pasted inside the URL.
 */
export function stripUrlWhitespace(url: string): string {
  return url.replace(/\s+/g, "");
}

/**
 * A watch URL that also carries a playlist (`v` and `list`).
 */
export function isMixedUrl(url: string): boolean {
  const query = queryOf(url);
  return query !== null && hasValue(query, "v") && hasValue(query, "list");
}

export function isPlaylistUrl(url: string): boolean {
  const query = queryOf(url);
  if (!query || !hasValue(query, "list")) return false;
  const parsed = parseUrl(url);
  if (parsed && parsed.pathname.startsWith("/playlist")) return true;
  return !hasValue(query, "v");
}

/**
 * Drop playlist parameters (`list`, `index`, `start`) to get the single video.
 */
export function stripListParam(url: string): string {
  const parsed = parseUrl(url);
  if (!parsed) return url;
  for (const param of ["list", "index", "start"]) {
    parsed.searchParams.delete(param);
  }
  return parsed.toString();
}

/**
 * Rewrite a mixed URL to the canonical playlist URL.
 */
export function toPlaylistUrl(url: string): string {
  const parsed = parseUrl(url);
  const listId = parsed?.searchParams.get("list");
  if (!parsed || !listId) return url;
  parsed.pathname = "/playlist";
  parsed.search = new URLSearchParams({ list: listId }).toString();
  return parsed.toString();
}
