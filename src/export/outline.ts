/**
 * Indented markdown outline of a subtree.
 */

import type { SubtreeTreeNode } from '../query/subtree.js';

const INDENT = '  ';

/**
 * Render one bullet per node, children indented beneath their parent.
 */
export function renderOutline(root: SubtreeTreeNode): string {
  const lines: string[] = [];
  const visit = (node: SubtreeTreeNode): void => {
    lines.push(`${INDENT.repeat(node.depth)}- ${describe(node)}`);
    for (const child of node.children) visit(child);
  };
  visit(root);
  return lines.join('\n');
}

function describe(node: SubtreeTreeNode): string {
  const { view } = node;
  switch (view.kind) {
    case 'requirement': {
      const pct = view.rollup ? ` - ${view.rollup.coveragePct.toFixed(1)}% covered` : '';
      return `**${view.id}**: ${view.label} (${metaOf(view.content)})${pct}`;
    }
    case 'assertion':
      return 'label' in view.content ? `${view.content.label}. ${view.label}` : view.label;
    default:
      return `${view.kind}: ${view.label} \`${view.id}\``;
  }
}

function metaOf(content: SubtreeTreeNode['view']['content']): string {
  return 'level' in content ? `${content.level}, ${content.status}` : '';
}
