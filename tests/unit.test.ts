import { describe, it, expect } from 'vitest';
import { AlreadyNestedError, InvalidLatticeAttachmentError } from '../src/errors.js';
import { linearIndex } from '../src/lattice.js';
import {
  attachLattice,
  cell,
  chainOf,
  countBins,
  describeUnit,
  innermost,
  join,
  outermost,
  surf,
  ucell,
  union,
  unionWith,
  univ,
  vec,
  vectorWith,
} from '../src/unit.js';

describe('join', () => {
  it('links both directions at once', () => {
    const a = cell('A');
    const b = univ('B');
    expect(join(a, b)).toBe(a);
    expect(a.up).toBe(b);
    expect(b.down).toBe(a);
    expect(a.down).toBeUndefined();
    expect(b.up).toBeUndefined();
  });

  it('composes nested joins into one chain addressed by its innermost level', () => {
    const a = cell('A');
    const b = univ('B');
    const c = ucell('C');
    const result = join(join(a, b), c);
    expect(result).toBe(a);
    expect(b.up).toBe(c);
    expect(c.down).toBe(b);
    expect(chainOf(a)).toEqual([a, b, c]);
  });

  it('returns the innermost level when the outer end of a chain is joined', () => {
    const a = cell('A');
    const b = univ('B');
    const c = ucell('C');
    join(a, b);
    expect(join(b, c)).toBe(a);
    expect(chainOf(c)).toEqual([a, b, c]);
  });

  it('refuses to nest into a level that already contains one', () => {
    const a = cell('A');
    const b = univ('B');
    const x = surf('X');
    join(a, b);
    expect(() => join(x, b)).toThrow(AlreadyNestedError);
    expect(x.up).toBeUndefined();
    expect(b.down).toBe(a);
  });

  it('refuses to close a chain into a cycle', () => {
    const a = cell('A');
    const b = univ('B');
    join(a, b);
    expect(() => join(b, a)).toThrow(AlreadyNestedError);
    expect(a.up).toBe(b);
    expect(b.up).toBeUndefined();
  });

  it('refuses to nest a union member inside its own union', () => {
    const a = cell('A');
    const u = union(a, cell('B'));
    expect(() => join(a, u)).toThrow(AlreadyNestedError);
    expect(a.up).toBeUndefined();
    expect(u.down).toBeUndefined();
  });

  it('refuses to nest the chain of a vector element inside that vector', () => {
    const a = cell('A');
    const b = univ('B');
    join(a, b);
    const v = vec(a, cell('C'));
    expect(() => join(b, v)).toThrow(AlreadyNestedError);
    expect(b.up).toBeUndefined();
    expect(v.down).toBeUndefined();
    expect(join(v, ucell('D'))).toBe(v);
  });

  it('navigates to both ends of a chain', () => {
    const a = cell('A');
    const b = univ('B');
    const c = ucell('C');
    join(join(a, b), c);
    expect(innermost(b)).toBe(a);
    expect(outermost(b)).toBe(c);
    expect(innermost(a)).toBe(a);
    expect(outermost(c)).toBe(c);
  });
});

describe('combinators', () => {
  it('flattens repeated unions into one', () => {
    const [a, b, c, d] = [cell('A'), cell('B'), cell('C'), cell('D')];
    const u = unionWith(unionWith(a, b), c);
    expect(u.kind).toBe('union');
    expect(u.alternatives).toEqual([a, b, c]);
    expect(unionWith(u, d)).toBe(u);
    expect(u.alternatives).toHaveLength(4);
  });

  it('flattens repeated vectors into one', () => {
    const [a, b, c] = [surf('A'), surf('B'), surf('C')];
    const v = vectorWith(vectorWith(a, b), c);
    expect(v.kind).toBe('vector');
    expect(v.elements).toEqual([a, b, c]);
  });

  it('wraps a different combinator instead of merging into it', () => {
    const v = vec(surf('A'), surf('B'));
    const u = unionWith(v, surf('C'));
    expect(u.alternatives[0]).toBe(v);
    expect(v.elements).toHaveLength(2);
  });

  it('accepts single-member unions', () => {
    expect(union(univ('U')).alternatives).toHaveLength(1);
  });
});

describe('lattice attachment', () => {
  it('attaches to a nested cell', () => {
    const spec = linearIndex(4);
    const d = attachLattice(ucell('D'), spec);
    expect(d.latticeSpec).toBe(spec);
  });

  it('rejects other unit kinds', () => {
    expect(() => attachLattice(cell('A'), linearIndex(1))).toThrow(InvalidLatticeAttachmentError);
    expect(() => attachLattice(surf('A'), linearIndex(1))).toThrow(
      'A lattice spec can only be attached to a nested cell, not to a surface'
    );
  });
});

describe('countBins', () => {
  it('multiplies the widths of vector levels', () => {
    const inner = vec(surf('A'), surf('B'));
    join(join(inner, ucell('C')), vec(ucell('D'), ucell('E')));
    expect(countBins(inner)).toBe(4);
  });

  it('counts every element of a vector nested in a vector', () => {
    expect(countBins(vec(surf('A'), vec(surf('B'), surf('C'))))).toBe(3);
  });

  it('counts a chain without vectors as one bin', () => {
    const a = cell('A');
    join(a, union(univ('U'), univ('V')));
    expect(countBins(a)).toBe(1);
  });
});

describe('describeUnit', () => {
  it('names leaves and sizes combinators', () => {
    expect(describeUnit(ucell('D'))).toBe("nested-cell 'D'");
    expect(describeUnit(vec(surf('A'), surf('B')))).toBe('vector of 2');
  });
});
