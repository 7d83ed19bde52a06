import { describe, it, expect } from "vitest";
import { applyBlocks, applyMove, applyMoveToBoard, nextPlayerId, skipTurn } from "./applyMove.ts";
import { countOwned, getCell } from "./board.ts";
import { pos } from "./coords.ts";
import { createTurnState, findPlayer, type Player, type TurnState } from "./state.ts";
import { parseBoard, renderBoard } from "../dev/boardText.ts";

function player(id: number, row: number, col: number, extra: Partial<Player> = {}): Player {
  return { id, name: `P${id}`, base: pos(row, col), alive: true, usedNeutrals: false, ...extra };
}

function mkState(rows: string[], current = 1, movesLeft = 1): TurnState {
  return createTurnState({
    board: parseBoard(rows),
    players: [player(1, 0, 0), player(2, 4, 4), player(3, 0, 4)],
    currentPlayer: current,
    actingPlayer: 1,
    movesLeft,
  });
}

describe("applyMoveToBoard", () => {
  it("claims the target and leaves the receiver alone", () => {
    const b = parseBoard(["A2...", ".....", ".....", ".....", "....B"]);
    const next = applyMoveToBoard(b, { kind: "attack", to: pos(0, 1), from: pos(0, 0) }, 1);
    expect(getCell(next, pos(0, 1))).toEqual({ owner: 1, flag: "normal" });
    expect(getCell(b, pos(0, 1))).toEqual({ owner: 2, flag: "normal" });
  });
});

describe("applyMove", () => {
  it("passes the turn when the last action is used", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....B"]);
    const next = applyMove(s, { kind: "grow", to: pos(1, 1), from: pos(0, 0) });
    expect(next.currentPlayer).toBe(2);
    expect(next.movesLeft).toBe(3);
    expect(getCell(next.board, pos(1, 1)).owner).toBe(1);
    expect(getCell(s.board, pos(1, 1)).owner).toBeNull();
    expect(s.currentPlayer).toBe(1);
  });

  it("copies the board once and leaves the input untouched", () => {
    const rows = ["A...C", ".1...", ".....", ".....", "....B"];
    const s = mkState(rows, 1, 3);
    const next = applyMove(s, { kind: "grow", to: pos(2, 2), from: pos(1, 1) });
    expect(renderBoard(next.board)).toBe(["A...C", ".1...", "..1..", ".....", "....B"].join("\n"));
    expect(renderBoard(s.board)).toBe(rows.join("\n"));
    expect(next.board.cells).not.toBe(s.board.cells);
    expect(next.board.bases).toEqual(s.board.bases);
  });

  it("keeps the turn while actions remain", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....B"], 1, 3);
    const next = applyMove(s, { kind: "grow", to: pos(1, 1), from: pos(0, 0) });
    expect(next.currentPlayer).toBe(1);
    expect(next.movesLeft).toBe(2);
  });

  it("eliminates a player who loses their last cell and skips them", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....2"], 1, 1);
    const pre = { ...s, board: parseBoard(["A...C", ".....", ".....", "...1.", "....2"]) };
    const next = applyMove(pre, { kind: "attack", to: pos(4, 4), from: pos(3, 3) });
    expect(countOwned(next.board, 2)).toBe(0);
    expect(findPlayer(next, 2)?.alive).toBe(false);
    expect(findPlayer(pre, 2)?.alive).toBe(true);
    expect(next.currentPlayer).toBe(3);
  });

  it("applies the move for whoever is to move", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....B"], 2);
    const next = applyMove(s, { kind: "grow", to: pos(3, 3), from: pos(4, 4) });
    expect(getCell(next.board, pos(3, 3)).owner).toBe(2);
    expect(next.currentPlayer).toBe(3);
  });
});

describe("turn rotation", () => {
  it("wraps around the roster and skips dead players", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....B"], 3);
    expect(nextPlayerId(s)).toBe(1);
    const p1 = findPlayer(s, 1);
    if (p1) p1.alive = false;
    expect(nextPlayerId(s)).toBe(2);
  });

  it("keeps the current player when nobody is alive", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....B"], 2);
    for (const p of s.players) p.alive = false;
    expect(nextPlayerId(s)).toBe(2);
  });

  it("skipTurn passes without touching the board", () => {
    const s = mkState(["A...C", ".....", ".....", ".....", "....B"], 1, 2);
    const next = skipTurn(s);
    expect(next.currentPlayer).toBe(2);
    expect(next.movesLeft).toBe(3);
    expect(next.board).not.toBe(s.board);
  });
});

describe("applyBlocks", () => {
  it("turns two own cells neutral, spends the allowance and ends the turn", () => {
    const s = mkState(["A11.C", ".1...", ".....", ".....", "....B"], 1, 3);
    const next = applyBlocks(s, [pos(0, 1), pos(0, 2), pos(1, 1)]);
    expect(getCell(next.board, pos(0, 1))).toEqual({ owner: "neutral", flag: "killed" });
    expect(getCell(next.board, pos(0, 2))).toEqual({ owner: "neutral", flag: "killed" });
    expect(getCell(next.board, pos(1, 1)).owner).toBe(1);
    expect(findPlayer(next, 1)?.usedNeutrals).toBe(true);
    expect(next.currentPlayer).toBe(2);
    expect(findPlayer(s, 1)?.usedNeutrals).toBe(false);
  });

  it("ignores cells the player does not own", () => {
    const s = mkState(["A1..C", ".....", ".....", ".....", "....B"]);
    const next = applyBlocks(s, [pos(4, 4), pos(2, 2), pos(0, 1)]);
    expect(getCell(next.board, pos(4, 4))).toEqual({ owner: 2, flag: "base" });
    expect(getCell(next.board, pos(0, 1)).owner).toBe("neutral");
  });

  it("is a no-op once the allowance is spent", () => {
    const s = mkState(["A1..C", ".....", ".....", ".....", "....B"]);
    const p1 = findPlayer(s, 1);
    if (p1) p1.usedNeutrals = true;
    const next = applyBlocks(s, [pos(0, 1), pos(0, 0)]);
    expect(getCell(next.board, pos(0, 1)).owner).toBe(1);
    expect(next.currentPlayer).toBe(1);
  });
});
