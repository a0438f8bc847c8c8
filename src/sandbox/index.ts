export { SandboxChain } from "./chain.js";
export { SandboxAsset } from "./asset.js";
export { SandboxOutcomeSet } from "./outcome-set.js";
