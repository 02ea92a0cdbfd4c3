import fs from 'node:fs';
import { z } from 'zod';
import { UnitDefinitionError } from './errors.js';
import { coordinates, indexRange, linearIndex, type Bounds, type LatticeSpec, type Triple } from './lattice.js';
import type { SystemDefinition } from './registry.js';
import { join, surf, cell, ucell, univ, union, vec, type Unit } from './unit.js';

export type LatticeExpression =
  | { lin: number }
  | { rng: { x?: Bounds; y?: Bounds; z?: Bounds } }
  | { cor: Triple | Triple[] };

/** JSON form of a tally unit. `in` lists its levels innermost first. */
export type UnitExpression =
  | { surf: string }
  | { cell: string }
  | { ucell: string; lat?: LatticeExpression }
  | { univ: string }
  | { union: UnitExpression[] }
  | { vec: UnitExpression[] }
  | { in: UnitExpression[] };

const int = z.number().int().safe();
const bounds = z.tuple([int, int]);
const triple = z.tuple([int, int, int]);
const name = z.string().min(1);

const latticeSchema = z.union([
  z.object({ lin: int }).strict(),
  z.object({ rng: z.object({ x: bounds.optional(), y: bounds.optional(), z: bounds.optional() }).strict() }).strict(),
  z.object({ cor: z.union([triple, z.array(triple).min(1)]) }).strict(),
]);

const unitSchema: z.ZodType<UnitExpression> = z.lazy(() =>
  z.union([
    z.object({ surf: name }).strict(),
    z.object({ cell: name }).strict(),
    z.object({ ucell: name, lat: latticeSchema.optional() }).strict(),
    z.object({ univ: name }).strict(),
    z.object({ union: z.array(unitSchema).min(1) }).strict(),
    z.object({ vec: z.array(unitSchema).min(1) }).strict(),
    z.object({ in: z.array(unitSchema).min(1) }).strict(),
  ])
);

const uniqueNames = z
  .array(name)
  .refine(names => new Set(names).size === names.length, { message: 'names must not repeat' });

const numberedNames = z.union([uniqueNames, z.record(int.positive())]);

const systemSchema = z
  .object({
    surfaces: numberedNames.optional(),
    cells: numberedNames.optional(),
    universes: numberedNames.optional(),
  })
  .strict();

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseUnitExpression(value: unknown): UnitExpression {
  const parsed = unitSchema.safeParse(value);
  if (!parsed.success) {
    throw new UnitDefinitionError('unit expression', describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseSystemDefinition(value: unknown): SystemDefinition {
  const parsed = systemSchema.safeParse(value);
  if (!parsed.success) {
    throw new UnitDefinitionError('system definition', describeIssues(parsed.error));
  }
  return parsed.data;
}

function buildLattice(expr: LatticeExpression): LatticeSpec {
  if ('lin' in expr) return linearIndex(expr.lin);
  if ('rng' in expr) return indexRange(expr.rng);
  return coordinates(expr.cor);
}

function buildMembers(members: UnitExpression[]): [Unit, ...Unit[]] {
  const [first, ...rest] = members.map(buildUnit);
  if (!first) {
    throw new UnitDefinitionError('unit expression', ['(members): expected at least one unit']);
  }
  return [first, ...rest];
}

/**
 * Builds the unit graph for an already validated expression. An `in` list
 * returns its innermost level.
 */
export function buildUnit(expr: UnitExpression): Unit {
  if ('surf' in expr) return surf(expr.surf);
  if ('cell' in expr) return cell(expr.cell);
  if ('ucell' in expr) return ucell(expr.ucell, expr.lat ? buildLattice(expr.lat) : undefined);
  if ('univ' in expr) return univ(expr.univ);
  if ('union' in expr) return union(...buildMembers(expr.union));
  if ('vec' in expr) return vec(...buildMembers(expr.vec));
  const [first, ...rest] = buildMembers(expr.in);
  return rest.reduce((chain, outer) => join(chain, outer), first);
}

export function loadUnit(value: unknown): Unit {
  return buildUnit(parseUnitExpression(value));
}

export function readJsonFile(filePath: string, what: string): unknown {
  const text = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UnitDefinitionError(`${what} ${filePath}`, [message]);
  }
}
