import * as cheerio from "cheerio";
import { z } from "zod";
import type { RawPin } from "../../domain/models";
import { buildCandidateUrls, sizeTokenFromUrl } from "../../domain/url-fallback";
import type { PinExtractor } from "../adapter";
import { PINTEREST_SELECTORS, buildPinUrl } from "./selectors";
import { logger } from "../../core/logger";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const nullableString = z.string().nullish().transform((v) => v ?? null);
const count = z.number().int().nonnegative().nullish();

const ApiPinnerSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    full_name: nullableString,
    username: nullableString,
    follower_count: count,
    image_medium_url: nullableString,
    image_small_url: nullableString,
  })
  .passthrough();

const ApiBoardSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    name: nullableString,
    url: nullableString,
  })
  .passthrough();

const ApiPinSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform((v) => String(v)),
    title: nullableString,
    grid_title: nullableString,
    description: nullableString,
    images: z.record(z.string(), z.unknown()).nullish(),
    pinner: ApiPinnerSchema.nullish(),
    board: ApiBoardSchema.nullish(),
    reaction_counts: z.record(z.string(), z.number()).nullish(),
    aggregated_pin_data: z
      .object({
        aggregated_stats: z.object({ saves: count }).passthrough().nullish(),
      })
      .passthrough()
      .nullish(),
    repin_count: count,
    comment_count: count,
    link: nullableString,
    category: nullableString,
    pin_join: z
      .object({ visual_annotation: z.array(z.string()).nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/** `170x` -> `170`, `orig` -> `original`; other labels pass through. */
export function normalizeSizeLabel(label: string): string {
  if (label === "orig") return "original";
  const match = label.match(/^(\d+)x$/);
  return match?.[1] ?? label;
}

function imageUrlFrom(value: unknown): string | null {
  if (!isRecord(value)) return null;
  return typeof value.url === "string" && value.url.length > 0 ? value.url : null;
}

/** Maps one upstream pin object (page state or search API) to a raw record. */
export function normalizeApiPin(input: unknown): RawPin | null {
  const parsed = ApiPinSchema.safeParse(input);
  if (!parsed.success || !isRecord(input)) return null;
  const pin = parsed.data;

  const imageUrls: Record<string, string> = {};
  for (const [label, image] of Object.entries(pin.images ?? {})) {
    const url = imageUrlFrom(image);
    if (url) imageUrls[normalizeSizeLabel(label)] = url;
  }

  const largestImageUrl =
    imageUrls.original ?? buildCandidateUrls({ imageUrls, largestImageUrl: null })[0] ?? null;

  const likes = Object.values(pin.reaction_counts ?? {}).reduce((sum, n) => sum + Math.max(0, n), 0);
  const saves = pin.aggregated_pin_data?.aggregated_stats?.saves ?? pin.repin_count ?? 0;

  const categories = [
    ...(pin.category ? [pin.category] : []),
    ...(pin.pin_join?.visual_annotation ?? []),
  ];

  return {
    id: pin.id,
    title: pin.title ?? pin.grid_title,
    description: pin.description,
    imageUrls,
    largestImageUrl,
    creator: pin.pinner
      ? {
          name: pin.pinner.full_name,
          username: pin.pinner.username,
          id: pin.pinner.id != null ? String(pin.pinner.id) : null,
          followerCount: pin.pinner.follower_count ?? null,
          avatarUrl: pin.pinner.image_medium_url ?? pin.pinner.image_small_url,
        }
      : null,
    board: pin.board
      ? {
          id: pin.board.id != null ? String(pin.board.id) : null,
          name: pin.board.name,
          url: pin.board.url,
        }
      : null,
    categories,
    stats: { likes, saves, comments: pin.comment_count ?? 0 },
    url: buildPinUrl(pin.id),
    sourceLink: pin.link,
    rawData: input,
  };
}

function findPinMap(state: unknown): Record<string, unknown> | null {
  if (!isRecord(state)) return null;
  const props = isRecord(state.props) ? state.props : state;
  const redux = props.initialReduxState;
  if (isRecord(redux) && isRecord(redux.pins)) return redux.pins;
  return null;
}

function extractFromPageState($: cheerio.CheerioAPI): RawPin[] {
  const records: RawPin[] = [];
  for (const selector of PINTEREST_SELECTORS.DATA_SCRIPTS) {
    const text = $(selector).first().html();
    if (!text) continue;

    let state: unknown;
    try {
      state = JSON.parse(text);
    } catch (error) {
      logger.debug({ error, selector }, "Embedded page state is not valid JSON");
      continue;
    }

    const pinMap = findPinMap(state);
    if (!pinMap) continue;

    for (const [id, value] of Object.entries(pinMap)) {
      const record = normalizeApiPin(isRecord(value) ? { id, ...value } : value);
      if (record) records.push(record);
    }
    if (records.length > 0) break;
  }
  return records;
}

function labelForUrl(url: string): string | null {
  const token = sizeTokenFromUrl(url);
  if (!token) return null;
  if (token.original) return "original";
  if (token.width === null) return null;
  return token.height ? `${token.width}x${token.height}` : String(token.width);
}

export function parseSrcset(srcset: string): string[] {
  return srcset
    .split(",")
    .map((entry) => entry.trim().split(/\s+/)[0] ?? "")
    .filter((url) => url.length > 0);
}

function extractFromAnchors($: cheerio.CheerioAPI): RawPin[] {
  const records: RawPin[] = [];

  $(PINTEREST_SELECTORS.PINS.PIN_LINK).each((_, element) => {
    const anchor = $(element);
    const idMatch = (anchor.attr("href") ?? "").match(/\/pin\/(\d+)/);
    const id = idMatch?.[1];
    if (!id) return;

    const container = anchor.closest(PINTEREST_SELECTORS.PINS.PIN_ITEM);
    const scope = container.length > 0 ? container : anchor;
    const img = scope.find("img").first();
    if (img.length === 0) return;

    const urls = [img.attr("src") ?? "", ...parseSrcset(img.attr("srcset") ?? "")].filter((u) => u.length > 0);
    const imageUrls: Record<string, string> = {};
    for (const url of urls) {
      const label = labelForUrl(url);
      if (label && !imageUrls[label]) imageUrls[label] = url;
    }
    if (Object.keys(imageUrls).length === 0) return;

    const alt = img.attr("alt")?.trim();
    records.push({
      id,
      title: alt && alt.length > 0 ? alt : null,
      imageUrls,
      largestImageUrl: buildCandidateUrls({ imageUrls, largestImageUrl: null })[0] ?? null,
      url: buildPinUrl(id),
    });
  });

  return records;
}

/**
 * Records from a rendered search or pin page. The embedded page state is
 * preferred; pin anchors and their images are the fallback. Ids repeat across
 * both sources, so the first occurrence wins.
 */
export function extractPinsFromHtml(html: string): RawPin[] {
  const $ = cheerio.load(html);
  const fromState = extractFromPageState($);
  const records = fromState.length > 0 ? fromState : extractFromAnchors($);

  const seen = new Set<string>();
  return records.filter((record) => {
    if (seen.has(record.id)) return false;
    seen.add(record.id);
    return true;
  });
}

export class PinterestHtmlExtractor implements PinExtractor {
  extractRecords(html: string): RawPin[] {
    return extractPinsFromHtml(html);
  }
}
