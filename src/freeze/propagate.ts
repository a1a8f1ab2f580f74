import { tryInsertConstant } from "../ir/constants";
import { type Block, type Graph, type Node, prim } from "../ir/graph";
import { IRInvariantError } from "../jit/jit-errors";
import { graphDebug, graphUpdate } from "../jit/jit-log";
import type { ScriptModule } from "../jit/module";
import { Tensor } from "../runtime/tensor";
import type { FreezeContext } from "./context";
import { recordMutableAttrs } from "./record-mutable";
import { findConstantAttr } from "./resolve-chain";

function foldGetAttr(
  ctx: FreezeContext,
  node: Node,
  root: ScriptModule,
): boolean {
  const name = node.s("name");
  const owner = findConstantAttr(ctx, node.input(0), name, root);
  if (!owner) {
    return false;
  }
  if (!owner.hasattr(name)) {
    throw new IRInvariantError(
      `${prim.GetAttr} reads '${name}', which ${owner.type.qualifiedName} does not have`,
    );
  }

  const value = owner.attr(name);
  if (value instanceof Tensor) {
    // Frozen parameters are not trained any further.
    value.setRequiresGrad(false);
  }

  const graph = node.graph;
  const output = node.output();
  const constant = graph.withInsertPoint(node, () =>
    tryInsertConstant(graph, value, output.type),
  );
  if (!constant) {
    graphDebug("freeze", () =>
      `Kept ${owner.type.qualifiedName}.${name}: value has no literal form`,
    );
    return false;
  }

  constant.setDebugName(`${owner.type.qualifiedName}.${name}`);
  output.replaceAllUsesWith(constant);
  node.removeAllInputs();
  node.destroy();
  graphUpdate("freeze", () => `Folded %${constant.displayName()}`);
  return true;
}

/**
 * Replace every read of an immutable attribute with a literal. Mutable
 * attributes are recorded first, so a read is folded only when no SetAttr
 * in the graph can reach it. Returns the number of reads folded.
 */
export function propagateAttributes(
  ctx: FreezeContext,
  graph: Graph,
  root: ScriptModule,
): number {
  recordMutableAttrs(ctx, graph, root);

  let folded = 0;
  const blocks: Block[] = [graph.block];
  for (let block = blocks.pop(); block; block = blocks.pop()) {
    for (let node = block.firstNode(); node; ) {
      // The current node may be destroyed below.
      const next = node.nextInBlock();
      blocks.push(...node.blocks);
      if (node.kind === prim.GetAttr && foldGetAttr(ctx, node, root)) {
        folded++;
      }
      node = next;
    }
  }
  return folded;
}
