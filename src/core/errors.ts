/**
 * Extract error message from unknown catch value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export type DistkitErrorCode =
  | 'SCHEMA_VIOLATION'
  | 'DRIFT'
  | 'MALFORMED_DIRECTIVE'
  | 'UNATTRIBUTED_LINK'
  | 'MISSING_LICENSE'
  | 'INTEGRITY';

/**
 * Base class for every fatal condition raised by the resolver, the manifest
 * builder and the packager. None of them is retried.
 */
export class DistkitError extends Error {
  readonly code: DistkitErrorCode;
  readonly details: string[];

  constructor(code: DistkitErrorCode, message: string, details: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** The catalog (or another declarative input) failed structural validation. */
export class SchemaViolation extends DistkitError {
  constructor(message: string, issues: string[] = []) {
    super('SCHEMA_VIOLATION', message, issues);
  }
}

/** The catalog and the runtime's native configuration disagree. */
export class DriftError extends DistkitError {
  readonly modules: string[];

  constructor(modules: string[], details: string[]) {
    super('DRIFT', `extension metadata drift detected for: ${modules.join(', ')}`, details);
    this.modules = modules;
  }
}

export class MalformedDirectiveError extends DistkitError {
  readonly directive: string;

  constructor(reason: string, directive: string) {
    super('MALFORMED_DIRECTIVE', `${reason}: ${directive}`);
    this.directive = directive;
  }
}

/** The core binary links a system library outside the platform allow-list. */
export class UnattributedLinkError extends DistkitError {
  readonly libraries: string[];

  constructor(libraries: string[], flags: string) {
    super(
      'UNATTRIBUTED_LINK',
      `unexpected system libraries linked by the core: ${libraries.join(', ')}`,
      [`link flags: ${flags}`],
    );
    this.libraries = libraries;
  }
}

export class MissingLicenseError extends DistkitError {
  readonly extension: string;
  readonly links: string[];

  constructor(extension: string, links: string[]) {
    super(
      'MISSING_LICENSE',
      `missing license for locally linked libraries of extension ${extension}: ${links.join(', ')}`,
    );
    this.extension = extension;
    this.links = links;
  }
}

export class IntegrityError extends DistkitError {
  constructor(message: string, cause?: unknown) {
    super('INTEGRITY', message, cause === undefined ? [] : [errorMessage(cause)]);
  }
}
