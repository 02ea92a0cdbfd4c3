import { NameNotFoundError, type NameKind } from './errors.js';

/** Name to number lookups against the system definition a tally belongs to. */
export interface Registry {
  surfaceNumber(name: string): number;
  cellNumber(name: string): number;
  universeNumber(name: string): number;
}

/** Names in definition order (numbered from 1), or explicit numbers. */
export type NumberedNames = string[] | Record<string, number>;

export interface SystemDefinition {
  surfaces?: NumberedNames;
  cells?: NumberedNames;
  universes?: NumberedNames;
}

function toNumberMap(names: NumberedNames | undefined): Map<string, number> {
  if (!names) return new Map();
  if (Array.isArray(names)) {
    const numbers = new Map(names.map((name, i) => [name, i + 1]));
    if (numbers.size !== names.length) {
      throw new Error(`Names listed more than once: ${names.filter((name, i) => names.indexOf(name) !== i).join(', ')}`);
    }
    return numbers;
  }
  return new Map(Object.entries(names));
}

export class SystemRegistry implements Registry {
  private numbers: Record<NameKind, Map<string, number>>;

  constructor(definition: SystemDefinition) {
    this.numbers = {
      surface: toNumberMap(definition.surfaces),
      cell: toNumberMap(definition.cells),
      universe: toNumberMap(definition.universes),
    };
  }

  surfaceNumber(name: string): number {
    return this.lookup('surface', name);
  }

  cellNumber(name: string): number {
    return this.lookup('cell', name);
  }

  universeNumber(name: string): number {
    return this.lookup('universe', name);
  }

  private lookup(kind: NameKind, name: string): number {
    const num = this.numbers[kind].get(name);
    if (num === undefined) {
      throw new NameNotFoundError(kind, name);
    }
    return num;
  }
}
