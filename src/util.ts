import { Color, FILE_NAMES, Move, RANK_NAMES, Role, RoleChar, Square, SquareName } from './types.js';

export const defined = <A>(v: A | undefined): v is A => v !== undefined;

export const opposite = (color: Color): Color => (color === 'white' ? 'black' : 'white');

export const squareRank = (square: Square): number => square >> 3;

export const squareFile = (square: Square): number => square & 0x7;

export const isSquare = (square: number): square is Square =>
  Number.isInteger(square) && 0 <= square && square < 64;

export const squareFromCoords = (file: number, rank: number): Square | undefined =>
  0 <= file && file < 8 && 0 <= rank && rank < 8 ? file + 8 * rank : undefined;

export const roleToChar = (role: Role): RoleChar => {
  switch (role) {
    case 'pawn':
      return 'p';
    case 'knight':
      return 'n';
    case 'bishop':
      return 'b';
    case 'rook':
      return 'r';
    case 'queen':
      return 'q';
    case 'king':
      return 'k';
  }
};

export function charToRole(ch: RoleChar | Uppercase<RoleChar>): Role;
export function charToRole(ch: string): Role | undefined;
export function charToRole(ch: string): Role | undefined {
  switch (ch.toLowerCase()) {
    case 'p':
      return 'pawn';
    case 'n':
      return 'knight';
    case 'b':
      return 'bishop';
    case 'r':
      return 'rook';
    case 'q':
      return 'queen';
    case 'k':
      return 'king';
    default:
      return;
  }
}

export function parseSquare(str: SquareName): Square;
export function parseSquare(str: string): Square | undefined;
export function parseSquare(str: string): Square | undefined {
  if (str.length !== 2) return;
  return squareFromCoords(str.charCodeAt(0) - 'a'.charCodeAt(0), str.charCodeAt(1) - '1'.charCodeAt(0));
}

export const makeSquare = (square: Square): SquareName =>
  `${FILE_NAMES[squareFile(square)]}${RANK_NAMES[squareRank(square)]}`;

/**
 * Parses a move written as two square names around a colon, like `e2:e4`.
 * Case-insensitive, so `E2:E4` works as well.
 */
export const parseCoordinates = (str: string): Move | undefined => {
  const parts = str.toLowerCase().split(':');
  if (parts.length !== 2) return;
  const from = parseSquare(parts[0]);
  const to = parseSquare(parts[1]);
  if (!defined(from) || !defined(to)) return;
  return { from, to };
};

export const makeCoordinates = (move: Move): string => `${makeSquare(move.from)}:${makeSquare(move.to)}`;

export const moveEquals = (left: Move, right: Move): boolean => left.from === right.from && left.to === right.to;
