export { cleanupFrozenModule, getReferencedAttrs } from "./cleanup";
export {
  createFreezeContext,
  type FreezeContext,
  PreservedAttributes,
} from "./context";
export { type FreezeOptions, freezeModule } from "./freeze-module";
export { propagateAttributes } from "./propagate";
export { recordMutableAttrs } from "./record-mutable";
export { findConstantAttr } from "./resolve-chain";
