import type { CraftOrderMode } from "../../constants/CommandEnums";
import type { Position3D } from "../geometry";

export interface CraftOrder {
  id: string;
  recipeId: string;
  workstation: Position3D;
  mode: CraftOrderMode;
  /** Crafts left for REPEAT orders. */
  remaining: number;
  /** Stock level kept by MAINTAIN orders. */
  targetStock: number;
  priority: number;
  activeJobId: string | null;
  suspended: boolean;
}

export interface CraftOrderParams {
  recipeId: string;
  workstation: Position3D;
  mode: CraftOrderMode;
  count?: number;
  targetStock?: number;
  priority?: number;
}

export interface CraftOrderSnapshot {
  orders: CraftOrder[];
  nextSeq: number;
}
