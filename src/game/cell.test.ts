import { describe, it, expect } from "vitest";
import { decodeCell, encodeCell, isAttackableBy, neutralCell, ownedCell } from "./cell.ts";

describe("packed cell codec", () => {
  it("decodes owner and flag bits", () => {
    expect(decodeCell(0)).toEqual({ owner: null, flag: "normal" });
    expect(decodeCell(2)).toEqual({ owner: 2, flag: "normal" });
    expect(decodeCell(0x11)).toEqual({ owner: 1, flag: "base" });
    expect(decodeCell(0x23)).toEqual({ owner: 3, flag: "fortified" });
  });

  it("treats nibble 5 and the killed flag as neutral", () => {
    expect(decodeCell(5)).toEqual({ owner: "neutral", flag: "killed" });
    expect(decodeCell(0x32)).toEqual({ owner: "neutral", flag: "killed" });
  });

  it("keeps empty cells flag-free", () => {
    expect(decodeCell(0x10)).toEqual({ owner: null, flag: "normal" });
    expect(decodeCell(-3)).toEqual({ owner: null, flag: "normal" });
    expect(decodeCell(0x09)).toEqual({ owner: null, flag: "normal" });
  });

  it("encodes back to the packed form", () => {
    expect(encodeCell(ownedCell(4, "base"))).toBe(0x14);
    expect(encodeCell(ownedCell(2, "fortified"))).toBe(0x22);
    expect(encodeCell(neutralCell())).toBe(0x35);
    expect(encodeCell(decodeCell(0x12))).toBe(0x12);
  });

  it("only plain opponent cells are attackable", () => {
    expect(isAttackableBy(ownedCell(2), 1)).toBe(true);
    expect(isAttackableBy(ownedCell(2), 2)).toBe(false);
    expect(isAttackableBy(ownedCell(2, "base"), 1)).toBe(false);
    expect(isAttackableBy(ownedCell(2, "fortified"), 1)).toBe(false);
    expect(isAttackableBy(neutralCell(), 1)).toBe(false);
    expect(isAttackableBy({ owner: null, flag: "normal" }, 1)).toBe(false);
  });
});
