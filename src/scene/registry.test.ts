/**
 * Tests for the scene registry and the built-in scenes.
 */

import { describe, test, expect } from "vitest";
import { HittableList } from "../hittable";
import { materialsScene } from "../scenes";
import { getScene, listScenes, registerScene } from "./registry";

describe("scene registry", () => {
  test("built-in scenes are registered in order", () => {
    expect(listScenes().map((scene) => scene.name)).toEqual(["random-spheres", "materials"]);
  });

  test("lookup by name", () => {
    expect(getScene("materials")).toBe(materialsScene);
  });

  test("unknown names list the alternatives", () => {
    expect(() => getScene("nope")).toThrow(
      "Unknown scene 'nope'. Available: random-spheres, materials"
    );
  });

  test("names are unique", () => {
    expect(() =>
      registerScene({ ...materialsScene, build: () => new HittableList() })
    ).toThrow("Scene 'materials' is already registered");
  });
});
