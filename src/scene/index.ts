/**
 * Scene utilities - types and registry.
 */

export * from "./types";
export { registerScene, getScene, listScenes } from "./registry";
