import { AlreadyNestedError, InvalidLatticeAttachmentError } from './errors.js';
import type { LatticeSpec } from './lattice.js';

/**
 * Links shared by every level of a nested tally unit. `up` is the level this
 * one sits in, `down` the level sitting directly inside it. Both are only
 * ever set together, by {@link join}.
 */
export interface UnitLinks {
  up?: Unit;
  down?: Unit;
}

export interface SurfaceRef extends UnitLinks {
  kind: 'surface';
  readonly name: string;
}

export interface CellRef extends UnitLinks {
  kind: 'cell';
  readonly name: string;
}

/** A cell at a higher nesting level, optionally restricted to some lattice elements. */
export interface NestedCellRef extends UnitLinks {
  kind: 'nested-cell';
  readonly name: string;
  latticeSpec?: LatticeSpec;
}

export interface UniverseRef extends UnitLinks {
  kind: 'universe';
  readonly name: string;
}

export interface Union extends UnitLinks {
  kind: 'union';
  readonly alternatives: Unit[];
}

/** One separately tallied binding per element ("multiple bin" expansion). */
export interface Vector extends UnitLinks {
  kind: 'vector';
  readonly elements: Unit[];
}

export type Unit = SurfaceRef | CellRef | NestedCellRef | UniverseRef | Union | Vector;
export type UnitKind = Unit['kind'];

export function surf(name: string): SurfaceRef {
  return { kind: 'surface', name };
}

export function cell(name: string): CellRef {
  return { kind: 'cell', name };
}

export function ucell(name: string, latticeSpec?: LatticeSpec): NestedCellRef {
  return latticeSpec ? { kind: 'nested-cell', name, latticeSpec } : { kind: 'nested-cell', name };
}

export function univ(name: string): UniverseRef {
  return { kind: 'universe', name };
}

export function union(first: Unit, ...rest: Unit[]): Union {
  return { kind: 'union', alternatives: [first, ...rest] };
}

export function vec(first: Unit, ...rest: Unit[]): Vector {
  return { kind: 'vector', elements: [first, ...rest] };
}

export function attachLattice(node: Unit, spec: LatticeSpec): NestedCellRef {
  if (node.kind !== 'nested-cell') {
    throw new InvalidLatticeAttachmentError(node.kind);
  }
  node.latticeSpec = spec;
  return node;
}

export function describeUnit(node: Unit): string {
  switch (node.kind) {
    case 'surface':
    case 'cell':
    case 'nested-cell':
    case 'universe':
      return `${node.kind} '${node.name}'`;
    case 'union':
      return `union of ${node.alternatives.length}`;
    case 'vector':
      return `vector of ${node.elements.length}`;
  }
}

export function innermost(node: Unit): Unit {
  let current = node;
  while (current.down) current = current.down;
  return current;
}

export function outermost(node: Unit): Unit {
  let current = node;
  while (current.up) current = current.up;
  return current;
}

/** The levels of the chain `node` belongs to, innermost first. */
export function chainOf(node: Unit): Unit[] {
  const levels: Unit[] = [];
  for (let current: Unit | undefined = innermost(node); current; current = current.up) {
    levels.push(current);
  }
  return levels;
}

/** Every unit reachable from `node` through nesting links and union or vector members. */
function structureOf(node: Unit, seen: Set<Unit> = new Set()): Set<Unit> {
  for (const level of chainOf(node)) {
    if (seen.has(level)) continue;
    seen.add(level);
    const members = level.kind === 'union' ? level.alternatives : level.kind === 'vector' ? level.elements : [];
    for (const member of members) {
      structureOf(member, seen);
    }
  }
  return seen;
}

/**
 * Nests the chain containing `inner` inside `outer` and returns the innermost
 * level of the result, so `join(join(a, b), c)` reads "a in b in c".
 */
export function join(inner: Unit, outer: Unit): Unit {
  const top = outermost(inner);
  if (outer.down) {
    throw new AlreadyNestedError(
      `Cannot nest ${describeUnit(top)} in ${describeUnit(outer)}: it already contains ${describeUnit(outer.down)}`
    );
  }
  if (structureOf(top).has(outer) || structureOf(outer).has(top)) {
    throw new AlreadyNestedError(
      `Cannot nest ${describeUnit(top)} in ${describeUnit(outer)}: one already contains the other`
    );
  }
  top.up = outer;
  outer.down = top;
  return innermost(top);
}

export function unionWith(left: Unit, right: Unit): Union {
  if (left.kind === 'union') {
    left.alternatives.push(right);
    return left;
  }
  return union(left, right);
}

export function vectorWith(left: Unit, right: Unit): Vector {
  if (left.kind === 'vector') {
    left.elements.push(right);
    return left;
  }
  return vec(left, right);
}

// A vector nested in a vector contributes every one of its elements.
function binWidth(level: Unit): number {
  if (level.kind !== 'vector') return 1;
  return level.elements.reduce((width, element) => width + binWidth(element), 0);
}

/** Number of tally units the chain expands into: the product of its vector widths. */
export function countBins(node: Unit): number {
  return chainOf(node).reduce((bins, level) => bins * binWidth(level), 1);
}
