import { describe, it, expect } from "vitest";
import {
  categorize,
  categorizeByFilename,
  categorizeByDirectory,
  DEFAULT_CATEGORY,
} from "./categories.js";

describe("categorizeByFilename", () => {
  it("matches keywords case-insensitively", () => {
    expect(categorizeByFilename("Old_HOUSE.obj")).toBe("Buildings");
    expect(categorizeByFilename("MainCharacter.fbx")).toBe("Characters");
    expect(categorizeByFilename("item_crate.blend")).toBe("Props");
    expect(categorizeByFilename("oak_tree.obj")).toBe("Environment");
    expect(categorizeByFilename("fire_truck.fbx")).toBe("Vehicles");
  });

  it("prefers the keyword appearing first in the name", () => {
    expect(categorizeByFilename("tree_prop.obj")).toBe("Environment");
    expect(categorizeByFilename("prop_tree.obj")).toBe("Props");
  });

  it("ignores the extension", () => {
    expect(categorizeByFilename("rock.prop")).toBeNull();
  });

  it("returns null without a keyword", () => {
    expect(categorizeByFilename("rock.obj")).toBeNull();
  });
});

describe("categorizeByDirectory", () => {
  it("uses the folder directly under Models", () => {
    expect(categorizeByDirectory("Models/Vehicles/sedan.obj")).toBe("Vehicles");
    expect(categorizeByDirectory("Models/buildings/tower/a.obj")).toBe("Buildings");
  });

  it("ignores paths outside Models", () => {
    expect(categorizeByDirectory("Textures/Vehicles/sedan.png")).toBeNull();
  });

  it("ignores files placed directly in Models", () => {
    expect(categorizeByDirectory("Models/Vehicles")).toBeNull();
  });

  it("ignores unknown folder names", () => {
    expect(categorizeByDirectory("Models/Weapons/sword.obj")).toBeNull();
  });
});

describe("categorize", () => {
  it("lets the filename win over the directory", () => {
    expect(categorize("Models/Vehicles/tree_prop.obj")).toBe("Environment");
  });

  it("falls back to the directory", () => {
    expect(categorize("Models/Characters/hero_01.fbx")).toBe("Characters");
  });

  it("defaults to Misc", () => {
    expect(categorize("Audio/ambience.wav")).toBe(DEFAULT_CATEGORY);
    expect(DEFAULT_CATEGORY).toBe("Misc");
  });
});
