export type PassScope =
  | { kind: 'module' }
  | { kind: 'function'; target: string }
  | { kind: 'unknown' };

/** A recognized banner line in a dump. `line` is the 0-based line index. */
export interface HeaderDescriptor {
  name: string;
  line: number;
  scope: PassScope;
  text: string;
}

/** Handle returned by an artifact store: a file path or a row key. */
export type ArtifactHandle = string;

export interface PassRecord {
  readonly name: string;
  /** Discovery order within its pipeline, starting at 0 */
  readonly index: number;
  readonly scope: PassScope;
  readonly artifact: ArtifactHandle;
  readonly content: string;
}

export type PipelineSide = 'a' | 'b';

export function describeScope(scope: PassScope): string {
  switch (scope.kind) {
    case 'module': return 'module';
    case 'function': return `function ${scope.target}`;
    case 'unknown': return 'scope unknown';
  }
}
