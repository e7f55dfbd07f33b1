import type { SceneDef } from "./types";

const scenes = new Map<string, SceneDef>();

export function registerScene(scene: SceneDef): void {
  if (scenes.has(scene.name)) {
    throw new Error(`Scene '${scene.name}' is already registered`);
  }
  scenes.set(scene.name, scene);
}

export function getScene(name: string): SceneDef {
  const scene = scenes.get(name);
  if (!scene) {
    throw new Error(`Unknown scene '${name}'. Available: ${listScenes().map((s) => s.name).join(", ")}`);
  }
  return scene;
}

export function listScenes(): SceneDef[] {
  return [...scenes.values()];
}
