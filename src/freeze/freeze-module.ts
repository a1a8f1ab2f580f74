import { MissingMethodError, UnknownAttributeError } from "../jit/jit-errors";
import { graphDump, graphUpdate } from "../jit/jit-log";
import type { ScriptModule } from "../jit/module";
import { inlineCalls } from "../passes/inliner";
import { type OptimizeOptions, runOptimization } from "../passes/optimize";
import { cleanupFrozenModule } from "./cleanup";
import { createFreezeContext } from "./context";
import { propagateAttributes } from "./propagate";

/**
 * Options for freezing.
 */
export interface FreezeOptions {
  /** Method to freeze. Defaults to "forward". */
  methodName?: string;
  /**
   * Root attributes to keep as attributes: they are neither folded nor
   * removed, and reads through them stay dynamic.
   */
  preservedAttrs?: readonly string[];
  /** Run the optimizer on the frozen graph, optionally configured. */
  optimize?: boolean | OptimizeOptions;
}

/**
 * Freeze a module: returns a clone whose entry method reads every attribute
 * that is never written as a literal, with the attributes nothing reads any
 * more deleted. The input module is left untouched.
 *
 * Only the entry method is rewritten. Other methods of the clone still see
 * the original attribute layout, so calling them after freezing is not
 * supported when attributes were pruned.
 */
export function freezeModule(
  module: ScriptModule,
  options: FreezeOptions = {},
): ScriptModule {
  const {
    methodName = "forward",
    preservedAttrs = [],
    optimize = true,
  } = options;

  if (!module.findMethod(methodName)) {
    throw new MissingMethodError(module.type.qualifiedName, methodName);
  }
  for (const name of preservedAttrs) {
    if (!module.hasattr(name)) {
      throw new UnknownAttributeError(module.type.qualifiedName, name);
    }
  }

  const ctx = createFreezeContext();
  const frozen = module.clone();
  for (const name of preservedAttrs) {
    ctx.preserved.preserve(frozen, name);
  }

  const graph = frozen.getMethod(methodName).graph;
  const inlined = inlineCalls(graph);
  const folded = propagateAttributes(ctx, graph, frozen);
  if (optimize !== false) {
    runOptimization(graph, optimize === true ? {} : optimize);
  }
  const removed = cleanupFrozenModule(ctx, graph, frozen);

  graphUpdate("freeze", () =>
    `Inlined ${inlined} call(s), folded ${folded} attribute read(s), removed ${removed.length} attribute(s)`,
  );
  graphDump(
    "freeze",
    `${frozen.type.name}::${methodName}() after freezing module`,
    graph,
  );
  return frozen;
}
