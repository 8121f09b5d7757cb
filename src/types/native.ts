import type { ParsedDirective } from './setup.js';

/** Read-only view of the runtime's own Setup files and init table. */
export interface NativeExtensionIndex {
  readonly static: ReadonlyMap<string, ParsedDirective>;
  readonly shared: ReadonlyMap<string, ParsedDirective>;
  readonly disabled: ReadonlySet<string>;
  /** Extension name → init function, from the `_inittab` table. */
  readonly initTable: ReadonlyMap<string, string>;
}
