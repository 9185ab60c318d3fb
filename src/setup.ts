import { Board, boardEquals } from "./board.js";
import { SquareSet } from "./squareSet.js";
import { ByCastlingSide, ByColor, CastlingSide, Color, Square } from "./types.js";


/**
 * Original rook squares. A castling right is held as long as the matching
 * corner is part of `Setup.castlingRights`.
 */
export const ROOK_CORNERS: ByColor<ByCastlingSide<Square>> = {
    white: { king: 7, queen: 0 },
    black: { king: 63, queen: 56 },
}


export const hasCastlingRight = (castlingRights: SquareSet, color: Color, side: CastlingSide): boolean =>
    castlingRights.has(ROOK_CORNERS[color][side])


/**
 * A not necessarily legal chess position
 */
export interface Setup {
    board: Board;
    turn: Color;
    castlingRights: SquareSet;
    epSquare: Square | undefined;
    halfmoves: number;
    fullmoves: number;
}


export const defaultSetup = (): Setup => ({
    board: Board.default(),
    turn: 'white',
    castlingRights: SquareSet.corners(),
    epSquare: undefined,
    halfmoves: 0,
    fullmoves: 1
})


export const setupEquals = (left: Setup, right: Setup): boolean =>
    boardEquals(left.board, right.board)
    && left.turn === right.turn
    && left.castlingRights.equals(right.castlingRights)
    && left.epSquare === right.epSquare
    && left.halfmoves === right.halfmoves
    && left.fullmoves === right.fullmoves
