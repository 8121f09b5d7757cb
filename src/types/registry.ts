import { z } from 'zod';

// ─── Package registry (third-party libraries and their licenses) ───

export const PackageEntrySchema = z.object({
  version: z.string().optional(),
  library_names: z.array(z.string()).default([]),
  licenses: z.array(z.string()).optional(),
  license_file: z.string().optional(),
  license_public_domain: z.boolean().default(false),
}).strict();

export const PackageRegistrySchema = z.record(z.string(), PackageEntrySchema);

export type PackageEntry = z.infer<typeof PackageEntrySchema>;
export type PackageRegistry = z.infer<typeof PackageRegistrySchema>;
