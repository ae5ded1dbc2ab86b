/**
 * Schemas of the published datasets. The build step validates them before
 * writing precompressed twins; the server never parses them.
 */

import { z } from 'zod';

export const catalogEntrySchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int()]),
    name: z.string().min(1),
    brand: z.string(),
    /** Scent notes; order carries no meaning */
    notes: z.array(z.string()).default([]),
    concentration: z.string().nullable().optional(),
    year: z.number().int().nullable().optional(),
    images: z.array(z.string().url()).default([]),
    canonical_url: z.string().url().optional(),
  })
  .passthrough();

export const catalogSchema = z.array(catalogEntrySchema);

/**
 * Entry key (id or canonical URL) to image URL(s). `null` marks a lookup
 * that found nothing.
 */
export const imageMappingSchema = z.record(
  z.union([z.string().url(), z.array(z.string().url()), z.null()])
);

export type Catalog = z.infer<typeof catalogSchema>;
export type ImageMapping = z.infer<typeof imageMappingSchema>;

export const DATASET_SCHEMAS = {
  catalog: catalogSchema,
  images: imageMappingSchema,
} as const;

export type DatasetKind = keyof typeof DATASET_SCHEMAS;

export interface DatasetIssue {
  path: string;
  message: string;
}

export type DatasetValidation =
  | { success: true; records: number }
  | { success: false; issues: DatasetIssue[] };

/** Validate a parsed dataset; `records` counts entries or mapping keys. */
export function validateDataset(kind: DatasetKind, value: unknown): DatasetValidation {
  const result = DATASET_SCHEMAS[kind].safeParse(value);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  const records = Array.isArray(result.data) ? result.data.length : Object.keys(result.data).length;
  return { success: true, records };
}
