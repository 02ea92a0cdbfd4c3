export type Triple = [number, number, number];
export type Bounds = [number, number];

export interface LinearIndex {
  kind: 'linear';
  index: number;
}

/** Axis-aligned index range. A `[0, 0]` pair leaves that axis unused. */
export interface IndexRange {
  kind: 'range';
  x: Bounds;
  y: Bounds;
  z: Bounds;
}

export interface Coordinates {
  kind: 'coordinates';
  points: Triple[];
}

export type LatticeSpec = LinearIndex | IndexRange | Coordinates;

function checkInteger(value: number, what: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Lattice ${what} must be a safe integer, got ${value}`);
  }
  return value;
}

function checkBounds(bounds: Bounds, axis: string): Bounds {
  return [checkInteger(bounds[0], `${axis} bound`), checkInteger(bounds[1], `${axis} bound`)];
}

function isTriple(points: Triple | Triple[]): points is Triple {
  return typeof points[0] === 'number';
}

export function linearIndex(index: number): LinearIndex {
  return { kind: 'linear', index: checkInteger(index, 'index') };
}

export function indexRange(ranges: { x?: Bounds; y?: Bounds; z?: Bounds } = {}): IndexRange {
  return {
    kind: 'range',
    x: checkBounds(ranges.x ?? [0, 0], 'x'),
    y: checkBounds(ranges.y ?? [0, 0], 'y'),
    z: checkBounds(ranges.z ?? [0, 0], 'z'),
  };
}

/**
 * Lattice elements by index triple. A single triple is stored as a
 * one-element list.
 */
export function coordinates(points: Triple | Triple[] = [0, 0, 0]): Coordinates {
  const list = isTriple(points) ? [points] : points;
  if (list.length === 0) {
    throw new RangeError('Lattice coordinates need at least one point');
  }
  return {
    kind: 'coordinates',
    points: list.map(([i, j, k]): Triple => [
      checkInteger(i, 'coordinate'),
      checkInteger(j, 'coordinate'),
      checkInteger(k, 'coordinate'),
    ]),
  };
}

export function renderLatticeComment(spec: LatticeSpec): string {
  switch (spec.kind) {
    case 'linear':
      return `linear idx ${spec.index}`;
    case 'range':
      return `x range ${spec.x[0]}:${spec.x[1]}, y range ${spec.y[0]}:${spec.y[1]}, z range ${spec.z[0]}:${spec.z[1]}`;
    case 'coordinates':
      return 'coords' + spec.points.map(([i, j, k]) => ` (${i}, ${j}, ${k})`).join(',');
  }
}

/** Wire text including the square brackets the cell number is followed by. */
export function renderLatticeWire(spec: LatticeSpec): string {
  switch (spec.kind) {
    case 'linear':
      return `[${spec.index}]`;
    case 'range':
      return `[${spec.x[0]}:${spec.x[1]} ${spec.y[0]}:${spec.y[1]} ${spec.z[0]}:${spec.z[1]}]`;
    case 'coordinates':
      return `[${spec.points.map(([i, j, k]) => ` ${i} ${j} ${k}`).join(',')}]`;
  }
}
