// ─── Setup directives (legacy native build-configuration lines) ───

export const DEFAULT_VARIANT = 'default';

/** Structured view of one directive line. */
export interface ParsedDirective {
  extension: string;
  variant: string;
  sources: string[];
  defines: string[];
  includes: string[];
  /** Library names; archive names and paths (`libfoo.a`) are kept whole. */
  links: string[];
  frameworks: string[];
  linkerArgs: string[];
}

/**
 * - `synthesized`: primary line produced from the catalog or supplement lines
 * - `variant`: non-primary variant, built by auxiliary Makefile rules
 * - `native`: already declared by the runtime's own Setup files
 * - `config-c`: built into the core through the init table
 * - `external`: declared without sources for the target; carries links only
 */
export type DirectiveKind = 'synthesized' | 'variant' | 'native' | 'config-c' | 'external';

export interface SetupDirective {
  readonly extension: string;
  readonly variant: string;
  readonly kind: DirectiveKind;
  /** Emitted text; null for pass-through directives. */
  readonly text: string | null;
  readonly section: 'static' | 'shared';
  readonly parsed: Readonly<ParsedDirective>;
  /** Object paths of auxiliary variant objects, relative to the build root. */
  readonly variantObjects?: readonly string[];
  /** Loadable module produced by the variant link rule, if any. */
  readonly variantSharedLib?: string;
}

export interface SetupPlan {
  readonly directives: readonly SetupDirective[];
  readonly disabled: readonly string[];
  /** Content of Modules/Setup.local. */
  readonly setupLocal: string;
  /** Makefile supplement with extra cflags and variant rules. */
  readonly makeData: string;
  /** Object path → `-Dname=value` flags moved out of directive text. */
  readonly extraCflags: ReadonlyMap<string, readonly string[]>;
  /** Sidecar file name → original directive text. */
  readonly sidecars: ReadonlyMap<string, string>;
}
