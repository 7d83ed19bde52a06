import type { CellState, PlayerId, Position } from "../types.ts";
import type { Adjacency, Board } from "../game/board.ts";
import type { TurnState } from "../game/state.ts";
import { countOwned, createBoard, setCell } from "../game/board.ts";
import { createTurnState } from "../game/state.ts";
import { emptyCell, neutralCell, ownedCell } from "../game/cell.ts";

/*
 * One character per cell:
 *   .  empty        1-4  normal cell of that player
 *   A-D base of 1-4 a-d  fortified cell of 1-4
 *   #  neutral / killed
 * A base letter also records the player's base position.
 */

const BASE_LETTERS = "ABCD";
const FORTIFIED_LETTERS = "abcd";

function cellFromChar(ch: string): CellState {
  if (ch === "#") return neutralCell();
  if (ch >= "1" && ch <= "4") return ownedCell(Number(ch));
  const b = BASE_LETTERS.indexOf(ch);
  if (b >= 0) return ownedCell(b + 1, "base");
  const f = FORTIFIED_LETTERS.indexOf(ch);
  if (f >= 0) return ownedCell(f + 1, "fortified");
  return emptyCell();
}

function charFromCell(cell: CellState): string {
  if (cell.owner === null) return ".";
  if (cell.owner === "neutral") return "#";
  if (cell.flag === "base") return BASE_LETTERS[cell.owner - 1] ?? "?";
  if (cell.flag === "fortified") return FORTIFIED_LETTERS[cell.owner - 1] ?? "?";
  return String(cell.owner);
}

export function parseBoard(
  rows: readonly string[],
  opts: { adjacency?: Adjacency; bases?: Record<PlayerId, Position> } = {}
): Board {
  const size = rows.length;
  const board = createBoard(size, opts.adjacency);
  rows.forEach((line, row) => {
    if (line.length !== size) throw new Error(`Row ${row} has ${line.length} cells, expected ${size}`);
    for (let col = 0; col < size; col++) {
      const ch = line.charAt(col);
      const cell = cellFromChar(ch);
      setCell(board, { row, col }, cell);
      if (cell.flag === "base" && typeof cell.owner === "number") {
        board.bases.set(cell.owner, { row, col });
      }
    }
  });
  for (const [id, p] of Object.entries(opts.bases ?? {})) {
    board.bases.set(Number(id), { row: p.row, col: p.col });
  }
  return board;
}

export function renderBoard(board: Board): string {
  const lines: string[] = [];
  for (let row = 0; row < board.size; row++) {
    let line = "";
    for (let col = 0; col < board.size; col++) {
      line += charFromCell(board.cells[row * board.size + col] ?? emptyCell());
    }
    lines.push(line);
  }
  return lines.join("\n");
}

/**
 * Turn state for a board drawn with `parseBoard`. The roster is every player
 * with a base letter on the board, in id order.
 */
export function parseTurnState(
  rows: readonly string[],
  opts: {
    adjacency?: Adjacency;
    currentPlayer?: PlayerId;
    actingPlayer?: PlayerId;
    movesLeft?: number;
    actionsPerTurn?: number;
    usedNeutrals?: PlayerId[];
  } = {}
): TurnState {
  const board = parseBoard(rows, { adjacency: opts.adjacency });
  const ids = Array.from(board.bases.keys()).sort((a, b) => a - b);
  const acting = opts.actingPlayer ?? ids[0] ?? 1;
  return createTurnState({
    board,
    players: ids.map((id) => ({
      id,
      name: `P${id}`,
      base: board.bases.get(id) ?? { row: 0, col: 0 },
      alive: countOwned(board, id) > 0,
      usedNeutrals: opts.usedNeutrals?.includes(id) ?? false,
    })),
    currentPlayer: opts.currentPlayer ?? acting,
    actingPlayer: acting,
    movesLeft: opts.movesLeft,
    actionsPerTurn: opts.actionsPerTurn,
  });
}
