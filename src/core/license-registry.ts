import fs from 'fs/promises';
import YAML from 'yaml';
import { ExtensionBuildRecord, LinkEntry, PackageRegistry, PackageRegistrySchema } from '../types/index.js';
import { MissingLicenseError, SchemaViolation, errorMessage } from './errors.js';
import { formatZodIssues } from './catalog-loader.js';

export function loadPackageRegistry(content: string): PackageRegistry {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new SchemaViolation(`package registry is not valid YAML: ${errorMessage(err)}`);
  }

  const result = PackageRegistrySchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new SchemaViolation(`package registry failed validation (${issues.length} issue(s))`, issues);
  }
  return result.data;
}

export async function loadPackageRegistryFile(filePath: string): Promise<PackageRegistry> {
  return loadPackageRegistry(await fs.readFile(filePath, 'utf8'));
}

export function isLocalLink(link: LinkEntry): boolean {
  return 'path_static' in link || 'path_dynamic' in link;
}

export type LicenseAnnotation = Pick<ExtensionBuildRecord, 'licenses' | 'license_paths' | 'license_public_domain'>;

/**
 * Reverse-lookup the packages providing each linked library. Packages without
 * declared licenses leave the link unattributed. Returns an empty object when
 * nothing was attributed; throws when a local link stays unattributed.
 */
export function attributeLicenses(
  extension: string,
  links: readonly LinkEntry[],
  registry: PackageRegistry,
  ignorePackages: readonly string[] = [],
): LicenseAnnotation {
  const licenses = new Set<string>();
  const licensePaths = new Set<string>();
  let publicDomain = false;
  let attributed = false;

  for (const link of links) {
    for (const [pkg, entry] of Object.entries(registry)) {
      if (ignorePackages.includes(pkg)) continue;
      if (!entry.library_names.includes(link.name)) continue;
      if (!entry.licenses) continue;

      attributed = true;
      for (const license of entry.licenses) licenses.add(license);
      if (entry.license_file) licensePaths.add(`licenses/${entry.license_file}`);
      publicDomain ||= entry.license_public_domain;
    }
  }

  if (!attributed) {
    const local = links.filter(isLocalLink).map(l => l.name);
    if (local.length > 0) {
      throw new MissingLicenseError(extension, local);
    }
    return {};
  }

  return {
    licenses: [...licenses].sort(),
    license_paths: [...licensePaths].sort(),
    license_public_domain: publicDomain,
  };
}
