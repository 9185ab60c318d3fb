import { Board } from './board.js';
import { ByRole, ROLES } from './types.js';

export const MATERIAL_VALUES: ByRole<number> = {
  pawn: 1,
  knight: 3,
  bishop: 3,
  rook: 5,
  queen: 9,
  king: 0,
};

/**
 * Material balance of `board`. Positive numbers favour white.
 */
export const evaluate = (board: Board): number =>
  ROLES.reduce(
    (score, role) =>
      score + MATERIAL_VALUES[role] * (board.pieces('white', role).size() - board.pieces('black', role).size()),
    0,
  );
