import { describe, it, expect } from "vitest";
import { fromIndex, inBounds, isCorner, isEdge, parsePosKey, pos, posKey, samePosition, toIndex } from "./coords.ts";

describe("coords", () => {
  it("formats and parses position keys", () => {
    expect(posKey(pos(3, 7))).toBe("r3c7");
    expect(parsePosKey("r3c7")).toEqual({ row: 3, col: 7 });
    expect(() => parsePosKey("3,7")).toThrow("Invalid position key: 3,7");
  });

  it("compares positions by value", () => {
    expect(samePosition(pos(1, 2), { row: 1, col: 2 })).toBe(true);
    expect(samePosition(pos(1, 2), pos(2, 1))).toBe(false);
  });

  it("bounds checks", () => {
    expect(inBounds(pos(0, 0), 5)).toBe(true);
    expect(inBounds(pos(4, 4), 5)).toBe(true);
    expect(inBounds(pos(-1, 0), 5)).toBe(false);
    expect(inBounds(pos(0, 5), 5)).toBe(false);
    expect(inBounds(pos(1.5, 0), 5)).toBe(false);
  });

  it("maps row-major offsets both ways", () => {
    expect(toIndex(pos(2, 3), 5)).toBe(13);
    expect(fromIndex(13, 5)).toEqual({ row: 2, col: 3 });
  });

  it("classifies edges and corners", () => {
    expect(isCorner(pos(0, 4), 5)).toBe(true);
    expect(isEdge(pos(0, 4), 5)).toBe(true);
    expect(isCorner(pos(0, 2), 5)).toBe(false);
    expect(isEdge(pos(0, 2), 5)).toBe(true);
    expect(isEdge(pos(2, 2), 5)).toBe(false);
  });
});
