/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ApiConfigSchema = z.object({
  baseUrl: z.url(),
  locale: z.string(),
  userAgent: z.string(),
  timeout: z.number().int().positive(), // In milliseconds
  retryAttempts: z.number().int().positive(),
  retryDelay: z.number().int().nonnegative(), // In milliseconds
  unitBatchSize: z.number().int().positive(),
});

export const DownloadConfigSchema = z.object({
  images: z.boolean(),
  maxConcurrentDownloads: z.number().int().positive(),
});

export const CleanupConfigSchema = z.object({
  deleteImages: z.boolean(),
});

export const StorageConfigSchema = z.object({
  outputDir: z.string(),
});

export const MarkdownConfigSchema = z.object({
  headingStyle: z.enum(["atx", "setext"]),
  codeBlockStyle: z.enum(["fenced", "indented"]),
  emphasis: z.enum(["_", "*"]),
  strong: z.enum(["__", "**"]),
  bulletMarker: z.enum(["-", "+", "*"]),
  horizontalRule: z.string(),
  codeFence: z.enum(["```", "~~~"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConfigSchema = z.object({
  api: ApiConfigSchema,
  download: DownloadConfigSchema,
  cleanup: CleanupConfigSchema,
  storage: StorageConfigSchema,
  markdown: MarkdownConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConfigSchema = ConfigSchema.partial().extend({
  api: ApiConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  cleanup: CleanupConfigSchema.partial().optional(),
  storage: StorageConfigSchema.partial().optional(),
  markdown: MarkdownConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type CleanupConfig = z.infer<typeof CleanupConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type Config = z.infer<typeof ConfigSchema>;
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
