import { type Block, type Graph, prim } from "../ir/graph";
import { graphUpdate } from "../jit/jit-log";
import type { ScriptModule } from "../jit/module";
import type { FreezeContext } from "./context";
import { findConstantAttr } from "./resolve-chain";

/**
 * Mark the target of every prim::SetAttr whose receiver chain resolves.
 * A SetAttr that does not resolve is skipped: the same resolver guards
 * every read, so an unresolved receiver never leads to a fold either.
 */
export function recordMutableAttrs(
  ctx: FreezeContext,
  graph: Graph,
  root: ScriptModule,
): void {
  const blocks: Block[] = [graph.block];
  for (let block = blocks.pop(); block; block = blocks.pop()) {
    for (const node of block.nodes()) {
      blocks.push(...node.blocks);
      if (node.kind !== prim.SetAttr) {
        continue;
      }
      const name = node.s("name");
      const owner = findConstantAttr(ctx, node.input(0), name, root);
      if (!owner) {
        continue;
      }
      ctx.preserved.preserve(owner, name);
      graphUpdate("freeze", () =>
        `Recorded mutable attribute ${owner.type.qualifiedName}.${name} (module #${owner.handle})`,
      );
    }
  }
}
