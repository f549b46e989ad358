import type { ElkExtendedEdge, ElkNode } from "elkjs";
import ELK from "elkjs/lib/elk.bundled.js";
import { type AstNode, formatNumber } from "@/expr-ast";

export const NODE_WIDTH = 120;
export const NODE_HEIGHT = 40;

export type TreeNodeCategory = "number" | "variable" | "operator" | "function";

export type TreeViewNode = {
  id: string; // 例: "n0" (前順)
  label: string;
  category: TreeNodeCategory;
  depth: number;
};

export type TreeViewEdge = {
  source: string;
  target: string;
};

export type TreeView = {
  nodes: TreeViewNode[];
  edges: TreeViewEdge[];
};

export type LaidOutNode = TreeViewNode & {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type LaidOutTree = {
  nodes: LaidOutNode[];
  edges: TreeViewEdge[];
  width: number;
  height: number;
};

export const elkLayoutOptions = {
  "elk.algorithm": "layered",
  "elk.direction": "DOWN",
  "elk.edgeRouting": "POLYLINE",
  "elk.spacing.nodeNode": "20",
  "elk.layered.spacing.nodeNodeBetweenLayers": "40",
  "elk.layered.nodePlacement.strategy": "BRANDES_KOEPF",
  // 左の子を左側に置くため入力順を尊重する
  "elk.layered.crossingMinimization.forceNodeModelOrder": "true",
  "elk.layered.considerModelOrder.strategy": "NODES_AND_EDGES",
} as const;

/**
 * 描画層向けに AST をノード/エッジの平坦なリストへ変換する。
 */
export function buildTreeView(ast: AstNode): TreeView {
  const nodes: TreeViewNode[] = [];
  const edges: TreeViewEdge[] = [];

  const visit = (node: AstNode, depth: number): string => {
    const id = `n${nodes.length}`;
    switch (node.kind) {
      case "number":
        nodes.push({ id, label: formatNumber(node.value), category: "number", depth });
        return id;
      case "identifier":
        nodes.push({ id, label: node.name, category: "variable", depth });
        return id;
      case "binop": {
        nodes.push({ id, label: node.op, category: "operator", depth });
        const left = visit(node.left, depth + 1);
        edges.push({ source: id, target: left });
        const right = visit(node.right, depth + 1);
        edges.push({ source: id, target: right });
        return id;
      }
      case "unary": {
        nodes.push({ id, label: node.op, category: "function", depth });
        const operand = visit(node.operand, depth + 1);
        edges.push({ source: id, target: operand });
        return id;
      }
    }
  };

  visit(ast, 0);
  return { nodes, edges };
}

export function createEdgeId(edge: TreeViewEdge, index: number) {
  return `${edge.source}-${edge.target}-${index}`;
}

export function buildElkGraph(view: TreeView): ElkNode {
  const children: ElkNode[] = view.nodes.map((n) => ({
    id: n.id,
    width: NODE_WIDTH,
    height: NODE_HEIGHT,
    labels: [{ text: n.label }],
  }));

  const edges: ElkExtendedEdge[] = view.edges.map((edge, index) => ({
    id: createEdgeId(edge, index),
    sources: [edge.source],
    targets: [edge.target],
  }));

  return {
    id: "root",
    layoutOptions: elkLayoutOptions,
    children,
    edges,
  };
}

/**
 * ELK で木を上から下へ配置し、各ノードの座標と全体の大きさを返す。
 */
export async function layoutTree(ast: AstNode): Promise<LaidOutTree> {
  const view = buildTreeView(ast);
  const elk = new ELK();
  const layout = await elk.layout(buildElkGraph(view), {
    layoutOptions: elkLayoutOptions,
  });

  const placed = new Map(
    (layout.children ?? []).map((child) => [child.id, child] as const),
  );
  const nodes = view.nodes.map((node): LaidOutNode => {
    const child = placed.get(node.id);
    return {
      ...node,
      x: child?.x ?? 0,
      y: child?.y ?? 0,
      width: child?.width ?? NODE_WIDTH,
      height: child?.height ?? NODE_HEIGHT,
    };
  });

  return {
    nodes,
    edges: view.edges,
    width: layout.width ?? 0,
    height: layout.height ?? 0,
  };
}
