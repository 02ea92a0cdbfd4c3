import type { TallyConfig, TallyResult } from './config.js';
import { loadUnit, parseSystemDefinition, readJsonFile } from './loader.js';
import { SystemRegistry, type Registry } from './registry.js';
import { renderComment, renderWire } from './render.js';
import { countBins, innermost, type Unit } from './unit.js';

export { type TallyConfig, type TallyResult, type OutputMode, parseArgs } from './config.js';
export {
  AlreadyNestedError,
  NameNotFoundError,
  InvalidLatticeAttachmentError,
  UnitDefinitionError,
  type NameKind,
} from './errors.js';
export {
  type LatticeSpec,
  type LinearIndex,
  type IndexRange,
  type Coordinates,
  type Triple,
  type Bounds,
  linearIndex,
  indexRange,
  coordinates,
  renderLatticeComment,
  renderLatticeWire,
} from './lattice.js';
export {
  type Unit,
  type UnitKind,
  type SurfaceRef,
  type CellRef,
  type NestedCellRef,
  type UniverseRef,
  type Union,
  type Vector,
  surf,
  cell,
  ucell,
  univ,
  union,
  vec,
  attachLattice,
  join,
  unionWith,
  vectorWith,
  innermost,
  outermost,
  chainOf,
  countBins,
  describeUnit,
} from './unit.js';
export { type Registry, type SystemDefinition, type NumberedNames, SystemRegistry } from './registry.js';
export { renderComment, renderWire } from './render.js';
export {
  type UnitExpression,
  type LatticeExpression,
  parseUnitExpression,
  parseSystemDefinition,
  buildUnit,
  loadUnit,
} from './loader.js';

/** Renders the whole chain `unit` belongs to, starting from its innermost level. */
export function describeTallyUnit(unit: Unit, registry: Registry): TallyResult {
  const start = innermost(unit);
  return {
    comment: renderComment(start),
    wire: renderWire(start, registry),
    bins: countBins(start),
  };
}

export function renderTallyUnit(config: TallyConfig): TallyResult {
  const system = parseSystemDefinition(readJsonFile(config.systemPath, 'system definition'));
  const unit = loadUnit(readJsonFile(config.unitPath, 'unit expression'));
  return describeTallyUnit(unit, new SystemRegistry(system));
}
