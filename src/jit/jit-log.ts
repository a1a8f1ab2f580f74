/**
 * Pass logging, switched on per pass through TENSORJIT_LOG_LEVEL.
 *
 *   TENSORJIT_LOG_LEVEL=freeze            graph dumps from the freeze pass
 *   TENSORJIT_LOG_LEVEL=>freeze,inliner   freeze updates, inliner dumps
 *   TENSORJIT_LOG_LEVEL=>>optimize        everything from the optimizer
 */

import type { Graph } from "../ir/graph";
import { printGraph } from "../ir/printer";

export type JitLogLevel = "dump" | "update" | "debug";

const LEVEL_RANK: Record<JitLogLevel, number> = {
  dump: 1,
  update: 2,
  debug: 3,
};

export type JitLogPass = "freeze" | "inliner" | "optimize";

export function parseJitLogLevels(setting: string): Map<string, JitLogLevel> {
  const levels = new Map<string, JitLogLevel>();
  for (const raw of setting.split(",")) {
    const entry = raw.trim();
    if (entry.length === 0) continue;
    let level: JitLogLevel = "dump";
    let name = entry;
    if (entry.startsWith(">>")) {
      level = "debug";
      name = entry.slice(2);
    } else if (entry.startsWith(">")) {
      level = "update";
      name = entry.slice(1);
    }
    levels.set(name.trim(), level);
  }
  return levels;
}

let cachedSetting: string | undefined;
let cachedLevels = new Map<string, JitLogLevel>();

function configuredLevels(): Map<string, JitLogLevel> {
  const setting =
    typeof process !== "undefined"
      ? (process.env?.TENSORJIT_LOG_LEVEL ?? "")
      : "";
  if (setting !== cachedSetting) {
    cachedSetting = setting;
    cachedLevels = parseJitLogLevels(setting);
  }
  return cachedLevels;
}

export function isJitLogEnabled(pass: JitLogPass, level: JitLogLevel): boolean {
  const enabled = configuredLevels().get(pass);
  return enabled !== undefined && LEVEL_RANK[enabled] >= LEVEL_RANK[level];
}

function emit(pass: JitLogPass, message: string): void {
  for (const line of message.split("\n")) {
    console.log(`[${pass}] ${line}`);
  }
}

export function graphDump(pass: JitLogPass, title: string, graph: Graph): void {
  if (!isJitLogEnabled(pass, "dump")) return;
  emit(pass, `${title}\n${printGraph(graph)}`);
}

export function graphUpdate(pass: JitLogPass, message: () => string): void {
  if (!isJitLogEnabled(pass, "update")) return;
  emit(pass, message());
}

export function graphDebug(pass: JitLogPass, message: () => string): void {
  if (!isJitLogEnabled(pass, "debug")) return;
  emit(pass, message());
}
