import { z } from "zod";
import { normalizePinId } from "../core/normalize";

export const ScrapingSessionStatusSchema = z.enum(["running", "completed", "interrupted", "failed"]);
export type ScrapingSessionStatus = z.infer<typeof ScrapingSessionStatusSchema>;

export const DownloadTaskStatusSchema = z.enum(["pending", "downloading", "completed", "failed"]);
export type DownloadTaskStatus = z.infer<typeof DownloadTaskStatusSchema>;

export const AcquisitionModeSchema = z.enum(["browser", "api"]);
export type AcquisitionMode = z.infer<typeof AcquisitionModeSchema>;

export const PinCreatorSchema = z.object({
  name: z.string().nullable().default(null),
  username: z.string().nullable().default(null),
  id: z.string().nullable().default(null),
  followerCount: z.number().int().nonnegative().nullable().default(null),
  avatarUrl: z.string().nullable().default(null),
});
export type PinCreator = z.infer<typeof PinCreatorSchema>;

export const PinBoardSchema = z.object({
  id: z.string().nullable().default(null),
  name: z.string().nullable().default(null),
  url: z.string().nullable().default(null),
});
export type PinBoard = z.infer<typeof PinBoardSchema>;

export const PinStatsSchema = z.object({
  likes: z.number().int().nonnegative().default(0),
  saves: z.number().int().nonnegative().default(0),
  comments: z.number().int().nonnegative().default(0),
});
export type PinStats = z.infer<typeof PinStatsSchema>;

export const PinSchema = z.object({
  id: z.string().trim().min(1).transform(normalizePinId),
  title: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  imageUrls: z.record(z.string(), z.string()).default({}),
  largestImageUrl: z.string().nullable().default(null),
  creator: PinCreatorSchema.nullable().default(null),
  board: PinBoardSchema.nullable().default(null),
  categories: z.array(z.string()).default([]),
  stats: PinStatsSchema.default({}),
  url: z.string().nullable().default(null),
  sourceLink: z.string().nullable().default(null),
  downloaded: z.boolean().default(false),
  downloadPath: z.string().nullable().default(null),
  rawData: z.record(z.string(), z.unknown()).default({}),
});
export type Pin = z.infer<typeof PinSchema>;

/** A record as produced by an extractor, before validation and defaulting. */
export type RawPin = z.input<typeof PinSchema>;

export interface ScrapingSession {
  id: string;
  keyword: string;
  targetCount: number;
  savedCount: number;
  outputDir: string;
  downloadImages: boolean;
  status: ScrapingSessionStatus;
  stats: Record<string, unknown>;
  startedAt: number;
  updatedAt: number;
  completedAt: number | null;
}

export interface DownloadTask {
  id: number;
  pinId: string;
  imageUrl: string;
  status: DownloadTaskStatus;
  localPath: string | null;
  fileSize: number | null;
  retryCount: number;
  errorMessage: string | null;
  createdAt: number;
  updatedAt: number;
}
