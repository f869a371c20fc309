/**
 * apkman Engine — Install Request Validation (Zod)
 *
 * Every request is validated on intake. A request that fails here is a
 * MALFORMED_REQUEST: it is logged and dropped without creating a record.
 */

import * as path from "path";
import { z } from "zod";
import type { InstallRequest } from "./types";

const Sha256Schema = z
  .string()
  .trim()
  .regex(/^[a-f0-9]{64}$/i, "must be 64 hex characters")
  .transform((hash) => hash.toLowerCase());

const DownloadUrlSchema = z
  .string()
  .url()
  .refine((url) => /^https:\/\//i.test(url), "must be an https URL");

export const ExpansionFileSchema = z.object({
  url: DownloadUrlSchema,
  destination: z
    .string()
    .min(1)
    .refine((p) => path.isAbsolute(p), "must be an absolute path")
    .refine((p) => p.endsWith(".obb"), "must end in .obb"),
  sha256: Sha256Schema,
});

export const InstallRequestSchema = z.object({
  url: DownloadUrlSchema,
  packageName: z.string().trim().min(1).max(255),
  versionCode: z.number().int().nonnegative(),
  size: z.number().int().nonnegative(),
  sha256: Sha256Schema,
  expansionFiles: z
    .object({
      main: ExpansionFileSchema.optional(),
      patch: ExpansionFileSchema.optional(),
    })
    .optional(),
});

export type RequestValidation =
  | { ok: true; request: InstallRequest }
  | { ok: false; errors: string[] };

/**
 * Validate raw input (parsed YAML/JSON, a redelivered payload) and
 * return a frozen InstallRequest.
 */
export function parseInstallRequest(input: unknown): RequestValidation {
  const result = InstallRequestSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    };
  }

  const { expansionFiles, ...rest } = result.data;
  const request: InstallRequest = expansionFiles
    ? {
        ...rest,
        expansionFiles: Object.freeze({
          ...(expansionFiles.main && {
            main: Object.freeze({ ...expansionFiles.main }),
          }),
          ...(expansionFiles.patch && {
            patch: Object.freeze({ ...expansionFiles.patch }),
          }),
        }),
      }
    : rest;

  return { ok: true, request: Object.freeze(request) };
}
