import { z } from 'zod';

// ─── Distribution Manifest (PYTHON.json) ───

export const MANIFEST_SCHEMA_VERSION = '8';

export const LinkEntrySchema = z.union([
  z.object({ name: z.string(), system: z.literal(true) }).strict(),
  z.object({ name: z.string(), framework: z.literal(true) }).strict(),
  z.object({ name: z.string(), path_static: z.string() }).strict(),
  z.object({ name: z.string(), path_dynamic: z.string() }).strict(),
]);

export const ExtensionBuildRecordSchema = z.object({
  in_core: z.boolean(),
  init_fn: z.string(),
  links: z.array(LinkEntrySchema),
  objs: z.array(z.string()),
  required: z.boolean(),
  variant: z.string(),
  licenses: z.array(z.string()).optional(),
  license_paths: z.array(z.string()).optional(),
  license_public_domain: z.boolean().optional(),
  shared_lib: z.string().optional(),
  static_lib: z.string().optional(),
}).strict();

export const CoreBuildInfoSchema = z.object({
  objs: z.array(z.string()),
  links: z.array(LinkEntrySchema),
  static_lib: z.string().optional(),
  shared_lib: z.string().optional(),
}).strict();

export const DistributionManifestSchema = z.object({
  version: z.string(),
  target_triple: z.string(),
  build_options: z.string(),
  python_version: z.string(),
  python_tag: z.string(),
  python_flavor: z.string(),
  python_exe: z.string(),
  python_include: z.string(),
  python_stdlib: z.string(),
  object_file_format: z.string(),
  python_extension_module_loading: z.array(z.string()),
  build_info: z.object({
    core: CoreBuildInfoSchema,
    extensions: z.record(z.string(), z.array(ExtensionBuildRecordSchema)),
  }).strict(),
  crt_features: z.array(z.string()),
  licenses: z.array(z.string()),
  license_path: z.string(),
}).strict();

export type LinkEntry = z.infer<typeof LinkEntrySchema>;
export type ExtensionBuildRecord = z.infer<typeof ExtensionBuildRecordSchema>;
export type CoreBuildInfo = z.infer<typeof CoreBuildInfoSchema>;
export type DistributionManifest = z.infer<typeof DistributionManifestSchema>;

// ─── Build variables reported by the built runtime (sysconfig dump) ───

export const BuildVariablesSchema = z.object({
  LIBS: z.string().default(''),
  SYSLIBS: z.string().default(''),
  LIBRARY: z.string().optional(),
  LDLIBRARY: z.string().optional(),
  EXT_SUFFIX: z.string().default('.so'),
  abiflags: z.string().default(''),
  /** Install prefix; the directories below are made relative to it. */
  prefix: z.string().optional(),
  BINDIR: z.string().optional(),
  INCLUDEPY: z.string().optional(),
  LIBDEST: z.string().optional(),
}).passthrough();

export type BuildVariables = z.infer<typeof BuildVariablesSchema>;

/** Relative paths of the compiled output tree, sorted. */
export type ArtifactTree = readonly string[];
