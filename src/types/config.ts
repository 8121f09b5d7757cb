import { z } from 'zod';

// ─── Project Config (.distkit/config.yaml) ───

export const TargetConfigSchema = z.object({
  triple: z.string().default('x86_64-unknown-linux-gnu'),
  python_version: z.string().default('3.13.1'),
  build_options: z.string().default('pgo+lto'),
  /** Overrides the EXT_SUFFIX of the build variables when naming variant modules. */
  ext_suffix: z.string().optional(),
  /** Recorded in `object_file_format` for lto builds. */
  llvm_version: z.string().optional(),
});

export const PathsConfigSchema = z.object({
  catalog: z.string().default('catalog/extension-modules.yml'),
  setup_files: z.array(z.string()).default(['cpython/Modules/Setup', 'cpython/Modules/Setup.stdlib.in']),
  init_table: z.string().default('cpython/Modules/config.c.in'),
  registry: z.string().default('data/packages.yml'),
  static_modules: z.string().optional(),
  build_variables: z.string().default('out/build-variables.json'),
  artifacts: z.string().default('out/python'),
  output_dir: z.string().default('dist'),
  tools_deps: z.string().default('/tools/deps'),
});

export const ArchiveConfigSchema = z.object({
  metadata_member: z.string().default('python/PYTHON.json'),
  prefix: z.string().default('python'),
  mtime: z.number().int().nonnegative().default(1704067200),
  owner: z.string().default('root'),
});

export const LicenseConfigSchema = z.object({
  ignore_packages: z.array(z.string()).default(['libressl']),
  runtime: z.array(z.string()).default(['Python-2.0', 'CNRI-Python']),
  license_path: z.string().default('licenses/LICENSE.cpython.txt'),
});

export const DistkitConfigSchema = z.object({
  version: z.string().default('1.0'),
  project: z.object({
    name: z.string(),
  }),
  target: TargetConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
  archive: ArchiveConfigSchema.default({}),
  licenses: LicenseConfigSchema.default({}),
});

export type TargetConfig = z.infer<typeof TargetConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type LicenseConfig = z.infer<typeof LicenseConfigSchema>;
export type DistkitConfig = z.infer<typeof DistkitConfigSchema>;

/** Sections a caller may patch; each is merged field by field. */
export interface DistkitConfigPatch {
  project?: Partial<DistkitConfig['project']>;
  target?: Partial<TargetConfig>;
  paths?: Partial<PathsConfig>;
  archive?: Partial<ArchiveConfig>;
  licenses?: Partial<LicenseConfig>;
}
