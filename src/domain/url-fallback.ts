import type { Pin } from "./models";

export interface SizeToken {
  original: boolean;
  width: number | null;
  height: number | null;
}

const ORIGINAL_LABELS = new Set(["original", "originals", "orig"]);
const PINIMG_HOST = "i.pinimg.com";
const PINIMG_SIZE_SEGMENT = /\/(\d+)x(\d*)\//;
const PINIMG_FALLBACK_SIZES = ["1200x", "736x", "564x", "474x"];
const KNOWN_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".gif", ".webp"]);

export function parseSizeToken(label: string): SizeToken | null {
  const normalized = label.trim().toLowerCase();
  if (ORIGINAL_LABELS.has(normalized)) {
    return { original: true, width: null, height: null };
  }

  const match = normalized.match(/^(\d+)x?(\d+)?$/);
  if (!match || !match[1]) return null;

  const width = Number.parseInt(match[1], 10);
  const height = match[2] ? Number.parseInt(match[2], 10) : null;
  return { original: false, width, height };
}

export function sizeTokenFromUrl(url: string): SizeToken | null {
  if (/\/originals\//.test(url)) {
    return { original: true, width: null, height: null };
  }

  const match = url.match(PINIMG_SIZE_SEGMENT);
  if (!match || !match[1]) return null;

  return {
    original: false,
    width: Number.parseInt(match[1], 10),
    height: match[2] ? Number.parseInt(match[2], 10) : null,
  };
}

/** Pixel area, estimating a missing height as 1.5x the width; originals outrank any finite size. */
export function scoreSize(token: SizeToken | null): number {
  if (!token) return 0;
  if (token.original) return Number.POSITIVE_INFINITY;
  if (token.width === null) return 0;
  const height = token.height ?? token.width * 1.5;
  return token.width * height;
}

function isPinimgUrl(url: string): boolean {
  try {
    return new URL(url).hostname === PINIMG_HOST;
  } catch {
    return false;
  }
}

/** Sibling resolutions of a CDN image URL, originals first. */
export function pinimgVariants(url: string): string[] {
  if (!isPinimgUrl(url)) return [];

  let original: string | null = null;
  if (url.includes("/originals/")) {
    original = url;
  } else if (PINIMG_SIZE_SEGMENT.test(url)) {
    original = url.replace(PINIMG_SIZE_SEGMENT, "/originals/");
  }
  if (!original) return [];

  const base = original;
  return [base, ...PINIMG_FALLBACK_SIZES.map((size) => base.replace("/originals/", `/${size}/`))];
}

interface Candidate {
  url: string;
  score: number;
}

/**
 * Priority-ordered, de-duplicated download candidates for one pin. The order is
 * fixed once built; callers try it front to back.
 */
export function buildCandidateUrls(pin: Pick<Pin, "imageUrls" | "largestImageUrl">): string[] {
  const candidates: Candidate[] = [];
  const push = (url: string, token: SizeToken | null) => {
    if (url.trim().length === 0) return;
    candidates.push({ url, score: scoreSize(token) });
  };

  for (const [label, url] of Object.entries(pin.imageUrls)) {
    push(url, parseSizeToken(label) ?? sizeTokenFromUrl(url));
  }
  if (pin.largestImageUrl) {
    push(pin.largestImageUrl, sizeTokenFromUrl(pin.largestImageUrl));
  }

  const known = candidates.map((c) => c.url);
  for (const url of known) {
    for (const variant of pinimgVariants(url)) {
      push(variant, sizeTokenFromUrl(variant));
    }
  }

  // Array.prototype.sort is stable, so equal scores keep discovery order.
  candidates.sort((a, b) => (a.score > b.score ? -1 : a.score < b.score ? 1 : 0));

  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    ordered.push(candidate.url);
  }
  return ordered;
}

export function imageExtension(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split("?")[0] ?? url;
  }

  const match = pathname.toLowerCase().match(/\.[a-z0-9]+$/);
  const ext = match?.[0];
  return ext && KNOWN_EXTENSIONS.has(ext) ? ext : ".jpg";
}
