/** Token → canonical name, assigned in first-seen order. */
export interface RenameTable {
  readonly prefix: string;
  next: number;
  readonly names: Map<string, string>;
}

export interface RenameState {
  temporaries: RenameTable;
  labels: RenameTable;
}

export const TEMPORARY_PREFIX = 'temp_';
export const LABEL_PREFIX = 'label_';

export function createRenameTable(prefix: string): RenameTable {
  return { prefix, next: 0, names: new Map() };
}

export function createRenameState(): RenameState {
  return {
    temporaries: createRenameTable(TEMPORARY_PREFIX),
    labels: createRenameTable(LABEL_PREFIX),
  };
}

/** Returns the canonical name for `token`, assigning the next one if unseen. */
export function canonicalName(table: RenameTable, token: string): string {
  let name = table.names.get(token);
  if (name === undefined) {
    name = `${table.prefix}${table.next}`;
    table.next++;
    table.names.set(token, name);
  }
  return name;
}
