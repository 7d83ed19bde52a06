import { describe, it, expect } from "vitest";
import { HeuristicStrategy, chooseBlockPositions, selectDiverseMoves } from "./heuristic.ts";
import type { ScoredMove } from "./evaluate.ts";
import type { Move } from "../game/moveTypes.ts";
import { pos, posKey } from "../game/coords.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { parseTurnState } from "../dev/boardText.ts";

const ZERO_FACTORS = { territory: 0, strategic: 0, threat: 0, connectivity: 0, expansion: 0, defensive: 0 };

function scored(toCol: number, fromCol: number, score: number): ScoredMove {
  const move: Move = { kind: "grow", to: pos(1, toCol), from: pos(0, fromCol) };
  return { move, factors: ZERO_FACTORS, score };
}

const targets = (moves: Move[]) => moves.map((m) => posKey(m.to));

describe("selectDiverseMoves", () => {
  it("returns everything in enumeration order when there are few candidates", () => {
    const list = [scored(0, 0, 1), scored(1, 0, 9)];
    expect(targets(selectDiverseMoves(list, 3))).toEqual(["r1c0", "r1c1"]);
  });

  it("passes over a repeated origin while fewer than K-1 origins are used", () => {
    const list = [scored(0, 0, 10), scored(1, 0, 9), scored(2, 1, 8), scored(3, 2, 7)];
    expect(targets(selectDiverseMoves(list, 3))).toEqual(["r1c0", "r1c2", "r1c3"]);
  });

  it("allows repeats once K-1 origins are used", () => {
    const list = [scored(0, 0, 10), scored(1, 1, 9), scored(2, 0, 8), scored(3, 2, 7)];
    expect(targets(selectDiverseMoves(list, 3))).toEqual(["r1c0", "r1c1", "r1c2"]);
  });

  it("tops up from the best leftovers", () => {
    const list = [scored(0, 0, 10), scored(1, 0, 9), scored(2, 0, 8), scored(3, 1, 1)];
    expect(targets(selectDiverseMoves(list, 3))).toEqual(["r1c0", "r1c1", "r1c3"]);
  });

  it("keeps enumeration order between equal scores", () => {
    const list = [scored(0, 0, 5), scored(1, 1, 5), scored(2, 2, 5), scored(3, 3, 5)];
    expect(targets(selectDiverseMoves(list, 2))).toEqual(["r1c0", "r1c1"]);
  });

  it("returns nothing for a non-positive count", () => {
    expect(selectDiverseMoves([scored(0, 0, 1)], 0)).toEqual([]);
  });
});

describe("HeuristicStrategy", () => {
  const rows = [".....", ".A1..", ".11..", ".....", "...B."];

  it("picks distinct legal targets", () => {
    const s = parseTurnState(rows);
    const legal = new Set(generateLegalMoves(s.board, 1).map((m) => `${m.kind}:${posKey(m.to)}`));
    const moves = new HeuristicStrategy().decideMoves(s, 3);
    expect(moves.length).toBe(3);
    expect(moves.every((m) => legal.has(`${m.kind}:${posKey(m.to)}`))).toBe(true);
    expect(new Set(targets(moves)).size).toBe(3);
  });

  it("takes an attack over a plain grow", () => {
    const s = parseTurnState(["A2...", ".....", ".....", ".....", "....B"]);
    const best = new HeuristicStrategy().bestMove(s);
    expect(best).toEqual({ kind: "attack", to: pos(0, 1), from: pos(0, 0) });
  });

  it("answers nothing when it is not the acting player's turn", () => {
    const s = parseTurnState(rows, { currentPlayer: 2 });
    const h = new HeuristicStrategy();
    expect(h.decideMoves(s, 3)).toEqual([]);
    expect(h.decideBlocks(s)).toEqual([]);
    expect(h.bestMove(s)).toBeNull();
  });

  it("answers nothing when walled in", () => {
    const s = parseTurnState(["22222", "2bbb2", "2bAb2", "2bbb2", "22222"]);
    expect(new HeuristicStrategy().decideMoves(s, 3)).toEqual([]);
  });

  it("records what it decided", () => {
    const h = new HeuristicStrategy();
    expect(h.lastInfo).toBeNull();
    h.decideMoves(parseTurnState(rows), 2);
    expect(h.lastInfo?.strategy).toBe("heuristic");
    expect(h.lastInfo?.moves).toBe(2);
  });
});

describe("chooseBlockPositions", () => {
  const rows = ["A1...", "11...", ".....", "...1.", "....B"];

  it("takes the two best cells", () => {
    expect(chooseBlockPositions(parseTurnState(rows))).toEqual([pos(3, 3), pos(0, 0)]);
  });

  it("does nothing once the allowance is spent", () => {
    expect(chooseBlockPositions(parseTurnState(rows, { usedNeutrals: [1] }))).toEqual([]);
  });

  it("needs two cells to work with", () => {
    expect(chooseBlockPositions(parseTurnState(["A....", ".....", ".....", ".....", "....B"]))).toEqual([]);
  });
});
