import { z } from 'zod';

// ─── Extension Module Catalog (extension-modules.yml) ───

export const EXTENSION_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

// YAML turns an unquoted `3.10` into the number 3.1, so versions must be
// quoted strings.
const VersionString = z.string().regex(/^\d+\.\d+(\.\d+)?([a-z]+\d*)?$/, 'expected a X.Y version');

const Patterns = z.array(z.string()).min(1);

const ConditionFields = {
  targets: Patterns.optional(),
  'minimum-python-version': VersionString.optional(),
  'maximum-python-version': VersionString.optional(),
};

export const ConditionalSourceSchema = z.object({ source: z.string(), ...ConditionFields }).strict();
export const ConditionalDefineSchema = z.object({ define: z.string(), ...ConditionFields }).strict();
export const ConditionalIncludeSchema = z.object({ path: z.string(), ...ConditionFields }).strict();
export const ConditionalLinkSchema = z.object({ name: z.string(), ...ConditionFields }).strict();
export const LinkerArgsSchema = z.object({
  args: z.array(z.string()).min(1),
  targets: Patterns,
}).strict();
export const ConditionalSetupEnabledSchema = z.object({ enabled: z.boolean(), ...ConditionFields }).strict();

export const ExtensionModuleSpecSchema = z.object({
  sources: z.array(z.string()).optional(),
  'sources-conditional': z.array(ConditionalSourceSchema).optional(),
  defines: z.array(z.string()).optional(),
  'defines-conditional': z.array(ConditionalDefineSchema).optional(),
  includes: z.array(z.string()).optional(),
  'includes-conditional': z.array(ConditionalIncludeSchema).optional(),
  'includes-deps': z.array(z.string()).optional(),
  links: z.array(z.string()).optional(),
  'links-conditional': z.array(ConditionalLinkSchema).optional(),
  'linker-args': z.array(LinkerArgsSchema).optional(),
  frameworks: z.array(z.string()).optional(),
  'build-mode': z.enum(['static', 'shared']).default('static'),
  'disabled-targets': z.array(z.string()).optional(),
  'required-targets': z.array(z.string()).optional(),
  'minimum-python-version': VersionString.optional(),
  'maximum-python-version': VersionString.optional(),
  'setup-enabled': z.boolean().default(false),
  'setup-enabled-conditional': z.array(ConditionalSetupEnabledSchema).optional(),
  'config-c-only': z.boolean().default(false),
}).strict();

export const CatalogSchema = z.record(
  z.string().regex(EXTENSION_NAME_PATTERN, 'extension names are lowercase identifiers'),
  ExtensionModuleSpecSchema,
);

export type Condition = {
  targets?: string[];
  'minimum-python-version'?: string;
  'maximum-python-version'?: string;
};

export type ExtensionModuleSpec = z.infer<typeof ExtensionModuleSpecSchema>;
export type Catalog = Readonly<Record<string, Readonly<ExtensionModuleSpec>>>;
