const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|]/g;
const MAX_WORK_NAME_LENGTH = 50;

export function normalizeKeyword(keyword: string): string {
  return keyword.trim().replace(/\s+/g, " ");
}

export function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim());
}

/**
 * Directory-safe name for a keyword or seed URL. URLs collapse to their last
 * non-empty path segment.
 */
export function sanitizeWorkName(input: string): string {
  let name = input.split("?")[0]?.split("#")[0] ?? "";
  if (name.includes("/")) {
    const parts = name.split("/").filter((p) => p.length > 0);
    name = parts[parts.length - 1] ?? name;
  }

  name = name.trim();
  if (name.length > MAX_WORK_NAME_LENGTH) {
    name = name.slice(0, MAX_WORK_NAME_LENGTH);
  }

  const safe = name.replace(UNSAFE_FILENAME_CHARS, "_");
  return safe.length > 0 ? safe : "scrape";
}

/** File name stem for a record id; path separators and reserved characters become `_`. */
export function safeFileStem(id: string): string {
  const stem = id.trim().replace(UNSAFE_FILENAME_CHARS, "_");
  return stem.length > 0 ? stem : "_";
}

export function normalizeUrl(url: string): string {
  try {
    const u = new URL(url);
    u.hash = "";
    return u.toString();
  } catch {
    return url;
  }
}

export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

const ENCODED_PIN_PREFIX = "UGlu";

/** `UGluOjEyMzQ=` is base64 for `Pin:1234`; such ids collapse to `1234`. */
export function normalizePinId(id: string): string {
  if (!id.startsWith(ENCODED_PIN_PREFIX)) return id;
  const decoded = Buffer.from(id, "base64").toString("utf8");
  const match = /^Pin:(\d+)$/.exec(decoded);
  return match?.[1] ?? id;
}

