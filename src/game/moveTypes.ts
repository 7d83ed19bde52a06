import type { Position } from "../types.ts";

export interface GrowMove {
  kind: "grow";
  to: Position;
  /** Equal to `to` for a first placement. */
  from: Position;
}

export interface AttackMove {
  kind: "attack";
  to: Position;
  from: Position;
}

export type Move = GrowMove | AttackMove;
