import type { CellFlag, CellState, PlayerId } from "../types.ts";

/*
 * Packed wire encoding: the low nibble carries the owner (0 empty, 1-4 players,
 * 5 neutral) and bits 0x30 carry the flag.
 */
export const PLAYER_MASK = 0x0f;
export const FLAG_MASK = 0x30;
export const NEUTRAL_NIBBLE = 5;

const FLAG_BITS: Record<CellFlag, number> = {
  normal: 0x00,
  base: 0x10,
  fortified: 0x20,
  killed: 0x30,
};

export const MAX_PLAYERS = 4;

export function emptyCell(): CellState {
  return { owner: null, flag: "normal" };
}

export function ownedCell(owner: PlayerId, flag: Exclude<CellFlag, "killed"> = "normal"): CellState {
  return { owner, flag };
}

export function neutralCell(): CellState {
  return { owner: "neutral", flag: "killed" };
}

export function isEmptyCell(cell: CellState): boolean {
  return cell.owner === null;
}

export function isOwnedBy(cell: CellState, playerId: PlayerId): boolean {
  return cell.owner === playerId;
}

/** Only plain cells of another player can be captured. */
export function isAttackableBy(cell: CellState, playerId: PlayerId): boolean {
  return typeof cell.owner === "number" && cell.owner !== playerId && cell.flag === "normal";
}

function flagFromBits(bits: number): CellFlag {
  switch (bits) {
    case 0x10:
      return "base";
    case 0x20:
      return "fortified";
    case 0x30:
      return "killed";
    default:
      return "normal";
  }
}

export function decodeCell(value: number): CellState {
  if (!Number.isInteger(value) || value < 0) return emptyCell();
  const nibble = value & PLAYER_MASK;
  const flag = flagFromBits(value & FLAG_MASK);

  if (nibble === 0) return emptyCell();
  if (nibble === NEUTRAL_NIBBLE || flag === "killed") return neutralCell();
  if (nibble > MAX_PLAYERS) return emptyCell();
  return { owner: nibble, flag };
}

export function encodeCell(cell: CellState): number {
  if (cell.owner === null) return 0;
  if (cell.owner === "neutral") return NEUTRAL_NIBBLE | FLAG_BITS.killed;
  return (cell.owner & PLAYER_MASK) | FLAG_BITS[cell.flag];
}
