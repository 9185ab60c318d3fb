import { Board } from "./board.js";
import { Position } from "./chess.js";
import { makePiece } from "./fen.js";
import { SquareSet } from "./squareSet.js";
import { Piece, Square } from "./types.js";
import { makeCoordinates, makeSquare } from "./util.js";

export const squareSet = (squares: SquareSet): string => {
  const r = [];
  for (let y = 7; y >= 0; y--) {
    for (let x = 0; x < 8; x++) {
      const square = x + y * 8;
      r.push(squares.has(square) ? '1' : '.');
      r.push(x < 7 ? ' ' : '\n');
    }
  }
  return r.join('');
};


export const piece = (piece: Piece): string => makePiece(piece)


export const board = (board: Board): string => {
  const r = [];
  for (let y = 7; y >= 0; y--) {
    for (let x = 0; x < 8; x++) {
      const p = board.get(x + y * 8);
      r.push(p ? piece(p) : '.');
      r.push(x < 7 ? ' ' : '\n');
    }
  }
  return r.join('');
};

export const square = (sq: Square): string => makeSquare(sq);


/**
 * Counts pseudo-legal move sequences of length `depth`.
 */
export const perft = (pos: Position, depth: number, log = false): number => {
    if (depth < 1) return 1;

    let nodes = 0;
    for (const [from, dests] of pos.allDests()) {
        for (const to of dests) {
            const child = pos.clone();
            child.applyMove(from, to).unwrap();
            const children = perft(child, depth - 1, false);
            if (log) console.log(makeCoordinates({ from, to }), children);
            nodes += children;
        }
    }
    return nodes;
}
