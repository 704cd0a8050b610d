import fs from 'fs';
import { z } from 'zod';

import { logger } from './logger';
import { createAppError } from '../utils/errors';

/**
 * An artifact family is one product line served from the shared artifact
 * directory. Its files are named `<name>_<version><extension>` and it gets
 * its own route pair: /check-update<routeSuffix> and /download<routeSuffix>.
 */
export const artifactFamilySchema = z.object({
  name: z
    .string()
    .min(1, 'Family name is required')
    .refine((name) => !/[\\/]/.test(name), 'Family name must not contain path separators'),
  extension: z.string().regex(/^\.[^\\/.]+$/, 'Extension must look like ".wasm"'),
  routeSuffix: z
    .string()
    .regex(/^(-[A-Za-z0-9-]+)?$/, 'Route suffix must be empty or start with "-"')
    .default(''),
  checksum: z.boolean().default(false),
});

export const artifactFamiliesSchema = z
  .array(artifactFamilySchema)
  .min(1, 'At least one artifact family is required')
  .superRefine((families, ctx) => {
    const seen = new Set<string>();
    families.forEach((family, index) => {
      if (seen.has(family.routeSuffix)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'routeSuffix'],
          message: `Duplicate route suffix "${family.routeSuffix}"`,
        });
      }
      seen.add(family.routeSuffix);
    });
  });

export type ArtifactFamily = z.infer<typeof artifactFamilySchema>;

/** Served when no families file is present */
export const DEFAULT_FAMILIES: ArtifactFamily[] = [
  { name: 'plugin', extension: '.wasm', routeSuffix: '', checksum: true },
];

export const checkUpdatePath = (family: ArtifactFamily): string => `/check-update${family.routeSuffix}`;

export const downloadPath = (family: ArtifactFamily): string => `/download${family.routeSuffix}`;

export const artifactFileName = (family: ArtifactFamily, version: string): string =>
  `${family.name}_${version}${family.extension}`;

/**
 * Load family definitions from a JSON file.
 * Missing file => DEFAULT_FAMILIES. Unparseable or invalid file => throws.
 */
export const loadFamilies = (filePath: string): ArtifactFamily[] => {
  if (!fs.existsSync(filePath)) {
    logger.warn({ path: filePath }, 'Families file not found, serving the default family');
    return DEFAULT_FAMILIES;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw createAppError(`Could not parse families file ${filePath}`, 500, 'INVALID_FAMILIES_FILE', error);
  }

  const result = artifactFamiliesSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('; ');
    throw createAppError(`Invalid families file ${filePath}: ${details}`, 500, 'INVALID_FAMILIES_FILE');
  }

  logger.info(
    { path: filePath, families: result.data.map((family) => family.name) },
    'Loaded artifact families'
  );
  return result.data;
};
