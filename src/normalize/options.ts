export interface NormalizeOptions {
  /** Drop lines that are blank in the source */
  dropBlankLines: boolean;
  /** Drop lines starting with `!` (metadata nodes) */
  dropMetadata: boolean;
  /** Remove `;` comments up to end of line */
  stripComments: boolean;
  /** Remove `, !dbg !N` attachments */
  stripDebugInfo: boolean;
  renameTemporaries: boolean;
  renameLabels: boolean;
  /** Collapse whitespace runs to a single space and trim */
  collapseWhitespace: boolean;
}

export const NORMALIZE_OPTION_KEYS = [
  'dropBlankLines',
  'dropMetadata',
  'stripComments',
  'stripDebugInfo',
  'renameTemporaries',
  'renameLabels',
  'collapseWhitespace',
] as const satisfies ReadonlyArray<keyof NormalizeOptions>;

export const DEFAULT_NORMALIZE_OPTIONS: Readonly<NormalizeOptions> = Object.freeze({
  dropBlankLines: true,
  dropMetadata: true,
  stripComments: false,
  stripDebugInfo: true,
  renameTemporaries: true,
  renameLabels: true,
  collapseWhitespace: true,
});
