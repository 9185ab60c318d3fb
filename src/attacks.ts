/**
 * Pseudo-legal move generation.
 *
 * Destinations are returned as ordered lists rather than square sets, so
 * that callers (and tests) see them in scan order: ray by ray for sliding
 * pieces, offset by offset for kings, knights and pawns. Moves that leave
 * the mover's own king in check are not filtered.
 *
 * Implementation notes: every ray and offset target is bounded against the
 * board edge once, when the tables below are built, so no lookup at query
 * time can wrap from one side of the board to the other.
 *
 * @packageDocumentation
 */

import { Board } from './board.js';
import { BySquare, ByColor, Color, Square } from './types.js';
import { isSquare, opposite, squareFile, squareRank } from './util.js';

const tabulate = <T>(f: (square: Square) => T): BySquare<T> => {
  const table = [];
  for (let square = 0; square < 64; square++) table[square] = f(square);
  return table;
};

const steps = (square: Square, delta: number, count: number): Square[] => {
  const squares = [];
  for (let i = 1; i <= count; i++) squares.push(square + i * delta);
  return squares;
};

// left, right, up, down
const ROOK_RAYS = tabulate(sq => {
  const file = squareFile(sq);
  const rank = squareRank(sq);
  return [steps(sq, -1, file), steps(sq, 1, 7 - file), steps(sq, 8, 7 - rank), steps(sq, -8, rank)];
});

// north-west, south-west, north-east, south-east
const BISHOP_RAYS = tabulate(sq => {
  const file = squareFile(sq);
  const rank = squareRank(sq);
  return [
    steps(sq, 7, Math.min(file, 7 - rank)),
    steps(sq, -9, Math.min(file, rank)),
    steps(sq, 9, Math.min(7 - file, 7 - rank)),
    steps(sq, -7, Math.min(7 - file, rank)),
  ];
});

const computeRange = (square: Square, deltas: number[], maxFileDelta: number): Square[] => {
  const range = [];
  for (const delta of deltas) {
    const sq = square + delta;
    if (0 <= sq && sq < 64 && Math.abs(squareFile(square) - squareFile(sq)) <= maxFileDelta) range.push(sq);
  }
  return range;
};

const KING_DELTAS = [-1, 1, -7, 7, -8, 8, -9, 9];

const KING_RANGE = tabulate(sq => computeRange(sq, KING_DELTAS, 1));

const KNIGHT_DELTAS = [-17, -15, -10, -6, 6, 10, 15, 17];

const KNIGHT_NORTH = [6, 10, 15, 17];
const KNIGHT_SOUTH = [-6, -10, -15, -17];
const KNIGHT_EAST = [-6, -15, 10, 17];
const KNIGHT_WEST = [6, 15, -10, -17];

const knightExclusions = (square: Square): Set<number> => {
  const excluded = new Set<number>();
  const exclude = (deltas: number[]) => deltas.forEach(delta => excluded.add(delta));

  const rank = squareRank(square);
  if (rank === 0) exclude(KNIGHT_SOUTH);
  else if (rank === 7) exclude(KNIGHT_NORTH);
  else if (rank === 1) exclude([-15, -17]);
  else if (rank === 6) exclude([15, 17]);

  const file = squareFile(square);
  if (file === 0) exclude(KNIGHT_WEST);
  else if (file === 7) exclude(KNIGHT_EAST);
  else if (file === 1) exclude([6, -10]);
  else if (file === 6) exclude([-6, 10]);

  return excluded;
};

const KNIGHT_RANGE = tabulate(sq => {
  const excluded = knightExclusions(sq);
  return KNIGHT_DELTAS.filter(delta => !excluded.has(delta))
    .map(delta => sq + delta)
    .filter(to => 0 <= to && to < 64);
});

const PAWN_CAPTURE_RANGE: ByColor<BySquare<Square[]>> = {
  white: tabulate(sq => computeRange(sq, [7, 9], 1)),
  black: tabulate(sq => computeRange(sq, [-7, -9], 1)),
};

/**
 * Walks `ray` away from the piece. Stops before the first square held by
 * `color`, and on (including) the first square held by the opponent.
 */
export const rayScan = (board: Board, color: Color, ray: Iterable<Square>): Square[] => {
  const own = board.occupancy(color);
  const opponent = board.occupancy(opposite(color));
  const dests = [];
  for (const square of ray) {
    if (own.has(square)) break;
    dests.push(square);
    if (opponent.has(square)) break;
  }
  return dests;
};

const scanAll = (board: Board, color: Color, rays: Square[][]): Square[] =>
  rays.flatMap(ray => rayScan(board, color, ray));

const notOwn = (board: Board, color: Color, range: Square[]): Square[] => {
  const own = board.occupancy(color);
  return range.filter(square => !own.has(square));
};

export const rookDests = (board: Board, color: Color, square: Square): Square[] =>
  scanAll(board, color, ROOK_RAYS[square]);

export const bishopDests = (board: Board, color: Color, square: Square): Square[] =>
  scanAll(board, color, BISHOP_RAYS[square]);

export const queenDests = (board: Board, color: Color, square: Square): Square[] =>
  rookDests(board, color, square).concat(bishopDests(board, color, square));

export const kingDests = (board: Board, color: Color, square: Square): Square[] =>
  notOwn(board, color, KING_RANGE[square]);

export const knightDests = (board: Board, color: Color, square: Square): Square[] =>
  notOwn(board, color, KNIGHT_RANGE[square]);

/**
 * Single and double pushes onto empty squares, then diagonal captures of
 * opponent pieces. En passant is not generated.
 */
export const pawnDests = (board: Board, color: Color, square: Square): Square[] => {
  const dests = [];
  const occupied = board.occupancy();
  const forward = color === 'white' ? 8 : -8;
  const step = square + forward;
  if (0 <= step && step < 64 && !occupied.has(step)) {
    dests.push(step);
    const doubleStep = step + forward;
    if (squareRank(square) === (color === 'white' ? 1 : 6) && !occupied.has(doubleStep)) {
      dests.push(doubleStep);
    }
  }
  const opponent = board.occupancy(opposite(color));
  for (const capture of PAWN_CAPTURE_RANGE[color][square]) {
    if (opponent.has(capture)) dests.push(capture);
  }
  return dests;
};

/**
 * Gets the pseudo-legal destinations of the piece on `square`, or
 * `undefined` if the square is empty.
 */
export const possibleMoves = (board: Board, square: Square): Square[] | undefined => {
  if (!isSquare(square)) return;
  const piece = board.get(square);
  if (!piece) return;
  switch (piece.role) {
    case 'pawn':
      return pawnDests(board, piece.color, square);
    case 'knight':
      return knightDests(board, piece.color, square);
    case 'bishop':
      return bishopDests(board, piece.color, square);
    case 'rook':
      return rookDests(board, piece.color, square);
    case 'queen':
      return queenDests(board, piece.color, square);
    case 'king':
      return kingDests(board, piece.color, square);
  }
};

