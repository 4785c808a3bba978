/**
 * Catalog entity types
 * Raw API shapes are validated with Zod, then normalized into CatalogEntity
 */

import { z } from "zod";

export const ENTITY_TYPES = [
  "learningPaths",
  "courses",
  "modules",
  "units",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

const StudyGuideItemSchema = z.object({
  uid: z.string(),
  type: z.string().nullish(),
});

// Fields vary by entity type; everything but the UID is optional.
// Unknown keys are stripped.
export const RawCatalogItemSchema = z.object({
  uid: z.string(),
  title: z.string().nullish(),
  summary: z.string().nullish(),
  url: z.string().nullish(),
  duration_in_minutes: z.number().nullish(),
  course_number: z.string().nullish(),
  modules: z.array(z.string()).nullish(),
  units: z.array(z.string()).nullish(),
  study_guide: z.array(StudyGuideItemSchema).nullish(),
});

export const CatalogResponseSchema = z.object({
  learningPaths: z.array(RawCatalogItemSchema).optional(),
  courses: z.array(RawCatalogItemSchema).optional(),
  modules: z.array(RawCatalogItemSchema).optional(),
  units: z.array(RawCatalogItemSchema).optional(),
});

export type RawCatalogItem = z.infer<typeof RawCatalogItemSchema>;
export type CatalogResponse = z.infer<typeof CatalogResponseSchema>;

/**
 * Normalized catalog entity (learning path, course, module or unit)
 * Immutable once created; lives for a single download run
 */
export interface CatalogEntity {
  readonly uid: string;
  readonly type: EntityType;
  readonly title: string;
  readonly summary: string;
  readonly url: string;
  readonly durationInMinutes: number;
  readonly courseNumber: string;
  // Ordered child UIDs: path -> modules, module -> units, course -> paths
  readonly children: readonly string[];
}

export interface CatalogFilters {
  type?: EntityType;
  uid?: string | readonly string[];
  locale?: string;
}
