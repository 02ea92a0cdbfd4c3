import { renderLatticeComment, renderLatticeWire } from './lattice.js';
import type { Registry } from './registry.js';
import type { Unit } from './unit.js';

// Parentheses open where a chain starts (an outer level but no inner one) and
// close where it ends. Everything outward of `node` is rendered after " in" / " <".
function frame(node: Unit, own: string, separator: string, renderUp: (up: Unit) => string): string {
  const open = node.up && !node.down ? ' (' : '';
  const outward = node.up ? separator + renderUp(node.up) : '';
  const close = node.down && !node.up ? ')' : '';
  return open + own + outward + close;
}

function commentText(node: Unit): string {
  switch (node.kind) {
    case 'surface':
      return ` surf '${node.name}'`;
    case 'cell':
      return ` cell '${node.name}'`;
    case 'nested-cell':
      return ` cell '${node.name}'` + (node.latticeSpec ? `-lat ${renderLatticeComment(node.latticeSpec)}` : '');
    case 'universe':
      return ` univ '${node.name}'`;
    case 'union':
      return ` union of (${node.alternatives.map(renderComment).join(',')})`;
    case 'vector':
      return ` over (${node.elements.map(renderComment).join(',')})`;
  }
}

function wireText(node: Unit, registry: Registry): string {
  const render = (member: Unit) => renderWire(member, registry);
  switch (node.kind) {
    case 'surface':
      return ` ${registry.surfaceNumber(node.name)}`;
    case 'cell':
      return ` ${registry.cellNumber(node.name)}`;
    case 'nested-cell':
      return ` ${registry.cellNumber(node.name)}` + (node.latticeSpec ? renderLatticeWire(node.latticeSpec) : '');
    case 'universe':
      return ` U=${registry.universeNumber(node.name)}`;
    case 'union':
      return ` (${node.alternatives.map(render).join('')})`;
    case 'vector':
      return node.elements.map(render).join('');
  }
}

/** Human-readable description of `node` and every level outside it. */
export function renderComment(node: Unit): string {
  return frame(node, commentText(node), ' in', renderComment);
}

/**
 * Wire-format text of `node` and every level outside it. Lookup failures
 * from `registry` propagate.
 */
export function renderWire(node: Unit, registry: Registry): string {
  return frame(node, wireText(node, registry), ' <', up => renderWire(up, registry));
}
