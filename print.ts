import { primaryRank, secondaryRank } from "./rank";
import { NONE, Slot, ZipNode, leftmost, successor } from "./zip-node";

/** The parts of a tree the dumps read. */
export interface PrintableTree<K> {
  readonly _nodes: ZipNode<K>[];
  readonly _root: Slot;
}

/** Renders the value stored at a slot, for maps; trees have none. */
export type ValueFormatter = (slot: Slot) => string;

function describeNode<K>(
  node: ZipNode<K>,
  slot: Slot,
  formatValue?: ValueFormatter
): string {
  const value = formatValue ? `, Value: ${formatValue(slot)}` : "";
  return (
    `Key: ${String(node.key)}${value}, ` +
    `Rank: (${primaryRank(node.rank)}, ${secondaryRank(node.rank)}), ` +
    `Count: ${node.count}`
  );
}

/**
 * Pre-order ASCII dump, one node per line with its slot, rank components,
 * subtree count and parent slot (`-` for the root). Diagnostic only.
 */
export function printTree<K>(
  tree: PrintableTree<K>,
  formatValue?: ValueFormatter
): string {
  const nodes = tree._nodes;
  const lines: string[] = [];

  function print(slot: Slot, prefix: string, connector: string, childPrefix: string) {
    const node = nodes[slot];
    const parent = node.parent === NONE ? "-" : String(node.parent);
    lines.push(
      `${prefix}${connector}Idx: ${slot}, ${describeNode(node, slot, formatValue)}, Parent: ${parent}`
    );
    const { left, right } = node;
    if (left !== NONE && right !== NONE) {
      print(left, childPrefix, "├── ", childPrefix + "│   ");
      print(right, childPrefix, "└── ", childPrefix + "    ");
    } else if (left !== NONE) {
      print(left, childPrefix, "└── ", childPrefix + "    ");
    } else if (right !== NONE) {
      print(right, childPrefix, "└── ", childPrefix + "    ");
    }
  }

  if (tree._root !== NONE) print(tree._root, "", "└── ", "    ");
  return lines.map((line) => line + "\n").join("");
}

/** One line per node in ascending key order. Diagnostic only. */
export function printInOrder<K>(
  tree: PrintableTree<K>,
  formatValue?: ValueFormatter
): string {
  const nodes = tree._nodes;
  let out = "";
  for (let slot = leftmost(nodes, tree._root); slot !== NONE; slot = successor(nodes, slot))
    out += describeNode(nodes[slot], slot, formatValue) + "\n";
  return out;
}
