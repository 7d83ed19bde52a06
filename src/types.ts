export type PlayerId = number;

export type CellOwner = PlayerId | "neutral" | null;
export type CellFlag = "normal" | "base" | "fortified" | "killed";

export interface CellState {
  owner: CellOwner;
  flag: CellFlag;
}

export interface Position {
  row: number;
  col: number;
}
