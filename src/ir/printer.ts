import { type IValue, ivalueToString } from "../jit/ivalue";
import { type JitType, typeToString } from "../jit/types";
import { Tensor } from "../runtime/tensor";
import { type Block, type Graph, type Node, prim, type Value } from "./graph";

function valueRef(value: Value): string {
  return `%${value.displayName()}`;
}

function typedValue(value: Value): string {
  return `${valueRef(value)} : ${typeToString(value.type)}`;
}

function formatLiteral(value: IValue, type: JitType | undefined): string {
  if (value instanceof Tensor) {
    return `<Tensor [${value.shape.join(", ")}]>`;
  }
  if (
    typeof value === "number" &&
    type?.kind === "Float" &&
    Number.isInteger(value)
  ) {
    return `${value}.`;
  }
  return ivalueToString(value);
}

function formatAttributes(node: Node): string {
  const names = node.attributeNames();
  if (names.length === 0) return "";
  const parts: string[] = [];
  for (const name of names) {
    const value = node.ival(name);
    // None constants print without a payload.
    if (node.kind === prim.Constant && value === null) continue;
    const type = node.kind === prim.Constant ? node.outputs[0]?.type : undefined;
    parts.push(`${name}=${formatLiteral(value, type)}`);
  }
  return parts.length === 0 ? "" : `[${parts.join(", ")}]`;
}

function printBlockBody(block: Block, indent: string, lines: string[]): void {
  for (const node of block.nodes()) {
    printNode(node, indent, lines);
  }
}

function printNode(node: Node, indent: string, lines: string[]): void {
  const inputs = node.inputs.map(valueRef).join(", ");
  const call = `${node.kind}${formatAttributes(node)}(${inputs})`;
  const outputs = node.outputs.map(typedValue).join(", ");
  lines.push(outputs.length > 0 ? `${indent}${outputs} = ${call}` : `${indent}${call}`);
  node.blocks.forEach((block, i) => {
    const params = block.inputs.map(typedValue).join(", ");
    lines.push(`${indent}  block${i}(${params}):`);
    printBlockBody(block, `${indent}    `, lines);
    lines.push(`${indent}    -> (${block.outputs.map(valueRef).join(", ")})`);
  });
}

/**
 * Render a graph as text, one node per line.
 *
 * ```
 * graph(%self : M,
 *       %x : Tensor):
 *   %scale : int = prim::Constant[value=2]()
 *   %3 : Tensor = aten::mul(%x, %scale)
 *   return (%3)
 * ```
 */
export function printGraph(graph: Graph): string {
  const lines: string[] = [];
  const params = graph.inputs.map(typedValue);
  lines.push(`graph(${params.join(",\n      ")}):`);
  printBlockBody(graph.block, "  ", lines);
  lines.push(`  return (${graph.outputs.map(valueRef).join(", ")})`);
  return lines.join("\n");
}
