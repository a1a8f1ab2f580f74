import { type Block, type Graph, prim } from "../ir/graph";
import { graphUpdate } from "../jit/jit-log";
import type { ScriptModule } from "../jit/module";
import { typesEqual } from "../jit/types";
import type { FreezeContext } from "./context";

/**
 * Root attributes that survive freezing: those still read straight off the
 * root by some prim::GetAttr, plus everything already preserved on the
 * root (mutated attributes, attributes the caller asked to keep).
 */
export function getReferencedAttrs(
  ctx: FreezeContext,
  graph: Graph,
  root: ScriptModule,
): ReadonlySet<string> {
  const blocks: Block[] = [graph.block];
  for (let block = blocks.pop(); block; block = blocks.pop()) {
    for (const node of block.nodes()) {
      blocks.push(...node.blocks);
      if (node.kind !== prim.GetAttr) {
        continue;
      }
      const name = node.s("name");
      if (typesEqual(node.input(0).type, root.type) && root.hasattr(name)) {
        ctx.preserved.preserve(root, name);
      }
    }
  }
  return ctx.preserved.namesFor(root);
}

/**
 * Delete every root attribute the frozen graph no longer needs, from the
 * instance and from its type. Submodules are left as they are: a surviving
 * submodule keeps all of its attributes.
 *
 * Returns the removed attribute names in declaration order.
 */
export function cleanupFrozenModule(
  ctx: FreezeContext,
  graph: Graph,
  root: ScriptModule,
): string[] {
  const keep = getReferencedAttrs(ctx, graph, root);
  const type = root.type;
  const toRemove: string[] = [];
  for (let slot = 0; slot < type.numAttributes(); slot++) {
    const name = type.getAttributeName(slot);
    if (!keep.has(name)) {
      toRemove.push(name);
    }
  }
  for (const name of toRemove) {
    root.unsafeRemoveAttr(name);
    type.unsafeRemoveAttribute(name);
  }
  if (toRemove.length > 0) {
    graphUpdate("freeze", () =>
      `Removed attributes of ${type.qualifiedName}: ${toRemove.join(", ")}`,
    );
  }
  return toRemove;
}
