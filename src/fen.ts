import { Result } from '@badrap/result';
import { Board } from './board.js';
import { SquareSet } from './squareSet.js';
import { CASTLING_SIDES, Color, COLORS, Piece, Square } from './types.js';
import { charToRole, defined, makeSquare, parseSquare, roleToChar } from './util.js';
import { hasCastlingRight, ROOK_CORNERS, Setup } from './setup.js';

export const INITIAL_BOARD_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR';
export const INITIAL_EPD = INITIAL_BOARD_FEN + ' w KQkq -';
export const INITIAL_FEN = INITIAL_EPD + ' 0 1';
export const EMPTY_BOARD_FEN = '8/8/8/8/8/8/8/8';
export const EMPTY_EPD = EMPTY_BOARD_FEN + ' w - -';
export const EMPTY_FEN = EMPTY_EPD + ' 0 1';

export enum InvalidFen {
  Fen = 'ERR_FEN',
  Board = 'ERR_BOARD',
  Turn = 'ERR_TURN',
  Castling = 'ERR_CASTLING',
  EpSquare = 'ERR_EP_SQUARE',
  Halfmoves = 'ERR_HALFMOVES',
  Fullmoves = 'ERR_FULLMOVES',
}

export class FenError extends Error {
  readonly code: InvalidFen;

  constructor(code: InvalidFen, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = 'FenError';
    this.code = code;
  }
}

/**
 * A placement field contained a letter that names no piece.
 */
export class UnsupportedPieceError extends FenError {
  readonly glyph: string;

  constructor(glyph: string) {
    super(InvalidFen.Board, `unsupported piece '${glyph}'`);
    this.name = 'UnsupportedPieceError';
    this.glyph = glyph;
  }
}

const CASTLING_CHARS: Record<string, Square> = {
  K: ROOK_CORNERS.white.king,
  Q: ROOK_CORNERS.white.queen,
  k: ROOK_CORNERS.black.king,
  q: ROOK_CORNERS.black.queen,
};

const parseSmallUint = (str: string): number | undefined => (/^\d{1,4}$/.test(str) ? parseInt(str, 10) : undefined);

const charToPiece = (ch: string): Piece | undefined => {
  const role = charToRole(ch);
  return role && { role, color: ch.toLowerCase() === ch ? 'black' : 'white' };
};

export const parseBoardFen = (boardPart: string): Result<Board, FenError> => {
  const ranks = boardPart.split('/');
  if (ranks.length !== 8) return Result.err(new FenError(InvalidFen.Board, `expected 8 ranks, got ${ranks.length}`));

  const board = Board.empty();
  for (let i = 0; i < 8; i++) {
    const rank = 7 - i;
    let file = 0;
    let previousWasDigit = false;
    for (const c of ranks[i]) {
      if ('0' <= c && c <= '9') {
        const step = parseInt(c, 10);
        if (step < 1 || step > 8) return Result.err(new FenError(InvalidFen.Board, `invalid empty run '${c}'`));
        if (previousWasDigit) return Result.err(new FenError(InvalidFen.Board, `consecutive digits on rank ${rank + 1}`));
        file += step;
        previousWasDigit = true;
      } else {
        const piece = charToPiece(c);
        if (!piece) return Result.err(new UnsupportedPieceError(c));
        if (file < 8) board.set(file + rank * 8, piece);
        file++;
        previousWasDigit = false;
      }
    }
    if (file !== 8) return Result.err(new FenError(InvalidFen.Board, `rank ${rank + 1} has ${file} files`));
  }
  return Result.ok(board);
};

export const parseCastlingFen = (castlingPart: string): Result<SquareSet, FenError> => {
  let castlingRights = SquareSet.empty();
  if (castlingPart === '-') return Result.ok(castlingRights);
  if (castlingPart.length > 4) return Result.err(new FenError(InvalidFen.Castling, `too many rights '${castlingPart}'`));

  for (const c of castlingPart) {
    const corner = CASTLING_CHARS[c];
    if (!defined(corner)) return Result.err(new FenError(InvalidFen.Castling, `invalid right '${c}'`));
    if (castlingRights.has(corner)) return Result.err(new FenError(InvalidFen.Castling, `duplicate right '${c}'`));
    castlingRights = castlingRights.with(corner);
  }

  return Result.ok(castlingRights);
};

export interface FenOpts {
  /** Board, turn, castling and en passant only, without the two counters. */
  epd?: boolean;
}

export const parseFen = (fen: string, opts?: FenOpts): Result<Setup, FenError> => {
  const parts = fen.trim().split(/\s+/);
  const expected = opts?.epd ? 4 : 6;
  if (parts.length !== expected) {
    return Result.err(new FenError(InvalidFen.Fen, `expected ${expected} fields, got ${parts[0] ? parts.length : 0}`));
  }
  const [boardPart, turnPart, castlingPart, epPart, halfmovePart, fullmovesPart] = parts;

  return parseBoardFen(boardPart).chain(board => {
    // Turn
    let turn: Color;
    if (turnPart === 'w') turn = 'white';
    else if (turnPart === 'b') turn = 'black';
    else return Result.err(new FenError(InvalidFen.Turn, `expected 'w' or 'b', got '${turnPart}'`));

    // Castling
    const castlingRights = parseCastlingFen(castlingPart);

    // En passant square
    let epSquare: Square | undefined;
    if (epPart !== '-') {
      epSquare = parseSquare(epPart);
      if (!defined(epSquare)) return Result.err(new FenError(InvalidFen.EpSquare, `invalid square '${epPart}'`));
    }

    // Counters
    const halfmoves = defined(halfmovePart) ? parseSmallUint(halfmovePart) : 0;
    if (!defined(halfmoves)) return Result.err(new FenError(InvalidFen.Halfmoves, `invalid counter '${halfmovePart}'`));

    const fullmoves = defined(fullmovesPart) ? parseSmallUint(fullmovesPart) : 1;
    if (!defined(fullmoves)) return Result.err(new FenError(InvalidFen.Fullmoves, `invalid counter '${fullmovesPart}'`));

    return castlingRights.map(castlingRights => ({
      board,
      turn,
      castlingRights,
      epSquare,
      halfmoves,
      fullmoves: Math.max(1, fullmoves),
    }));
  });
};

export const parsePiece = (str: string): Piece | undefined => {
  if (str.length !== 1) return;
  return charToPiece(str);
};

export const makePiece = (piece: Piece): string => {
  const r = roleToChar(piece.role);
  return piece.color === 'white' ? r.toUpperCase() : r;
};

export const makeBoardFen = (board: Board): string => {
  let fen = '';
  let empty = 0;
  for (let rank = 7; rank >= 0; rank--) {
    for (let file = 0; file < 8; file++) {
      const piece = board.get(file + rank * 8);
      if (!piece) empty++;
      else {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        fen += makePiece(piece);
      }

      if (file === 7) {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        if (rank !== 0) fen += '/';
      }
    }
  }
  return fen;
};

export const makeCastlingFen = (castlingRights: SquareSet): string => {
  let fen = '';
  for (const color of COLORS) {
    for (const side of CASTLING_SIDES) {
      if (hasCastlingRight(castlingRights, color, side)) {
        const c = side === 'king' ? 'k' : 'q';
        fen += color === 'white' ? c.toUpperCase() : c;
      }
    }
  }
  return fen || '-';
};

export const makeFen = (setup: Setup, opts?: FenOpts): string =>
  [
    makeBoardFen(setup.board),
    setup.turn[0],
    makeCastlingFen(setup.castlingRights),
    defined(setup.epSquare) ? makeSquare(setup.epSquare) : '-',
    ...(opts?.epd ? [] : [Math.max(0, Math.min(setup.halfmoves, 9999)), Math.max(1, Math.min(setup.fullmoves, 9999))]),
  ].join(' ');
