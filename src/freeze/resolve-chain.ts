import { prim, type Value } from "../ir/graph";
import { graphDebug } from "../jit/jit-log";
import { ScriptModule } from "../jit/module";
import { typesEqual } from "../jit/types";
import type { FreezeContext } from "./context";

/**
 * Locate the module instance that owns attribute `name` read (or written)
 * through `receiver`, by chasing the prim::GetAttr chain back to a value of
 * the root module's type:
 *
 *   %A = prim::GetAttr[name="A"](%self)
 *   %B = prim::GetAttr[name="B"](%A)
 *   %scale = prim::GetAttr[name="scale"](%B)
 *
 * findConstantAttr(ctx, %B, "scale", root) returns root.A.B when neither
 * A, B nor scale is preserved along the way, and undefined otherwise.
 * Any other producer on the chain (tuple unpacking, block parameters, ...)
 * makes the chain unresolved.
 */
export function findConstantAttr(
  ctx: FreezeContext,
  receiver: Value,
  name: string,
  root: ScriptModule,
): ScriptModule | undefined {
  const path: string[] = [];
  let current = receiver;
  while (!typesEqual(current.type, root.type)) {
    const producer = current.node;
    if (producer.kind !== prim.GetAttr) {
      graphDebug("freeze", () =>
        `Unresolved chain for '${name}': %${current.displayName()} comes from ${producer.kind}`,
      );
      return undefined;
    }
    path.push(producer.s("name"));
    current = producer.input(0);
  }

  let module = root;
  for (let i = path.length - 1; i >= 0; i--) {
    const step = path[i];
    if (ctx.preserved.isPreserved(module, step)) {
      graphDebug("freeze", () =>
        `Chain for '${name}' passes through mutable ${module.type.qualifiedName}.${step}`,
      );
      return undefined;
    }
    if (!module.hasattr(step)) {
      return undefined;
    }
    const next = module.attr(step);
    if (!(next instanceof ScriptModule)) {
      return undefined;
    }
    module = next;
  }
  return ctx.preserved.isPreserved(module, name) ? undefined : module;
}
