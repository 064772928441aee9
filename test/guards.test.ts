import { describe, expect, it } from "vitest";
import {
  isNode,
  isPod,
  isPodList,
  stampOwner,
} from "../src/models/guards.js";
import { NODE_ANNOTATION, type Pod } from "../src/models/types.js";

describe("guards", () => {
  it("accepts pod-shaped objects", () => {
    expect(isPod({})).toBe(true);
    expect(isPod({ metadata: { name: "web" }, status: { phase: "Running" } })).toBe(true);
  });

  it("rejects values that cannot be pods", () => {
    expect(isPod(null)).toBe(false);
    expect(isPod([])).toBe(false);
    expect(isPod({ metadata: "web" })).toBe(false);
  });

  it("checks every item of a pod list", () => {
    expect(isPodList({ items: [{}, { metadata: {} }] })).toBe(true);
    expect(isPodList({ items: [{}, 3] })).toBe(false);
    expect(isPodList({})).toBe(false);
  });

  it("checks nodes", () => {
    expect(isNode({ metadata: { name: "a" } })).toBe(true);
    expect(isNode({ status: [] })).toBe(false);
  });
});

describe("stampOwner", () => {
  it("adds the owner annotation to a copy", () => {
    const pod: Pod = {
      metadata: { name: "web", annotations: { team: "core" } },
    };

    const stamped = stampOwner(pod, "alpha");

    expect(stamped.metadata?.annotations).toEqual({
      team: "core",
      [NODE_ANNOTATION]: "alpha",
    });
    expect(pod.metadata?.annotations).toEqual({ team: "core" });
    expect(pod.metadata?.annotations?.[NODE_ANNOTATION]).toBeUndefined();
  });

  it("replaces a stale owner", () => {
    const stale = stampOwner({ metadata: { name: "web" } }, "old");
    expect(
      stampOwner(stale, "new").metadata?.annotations?.[NODE_ANNOTATION],
    ).toBe("new");
  });
});
