import { Result } from "@badrap/result"
import { possibleMoves } from "./attacks.js"
import { Board } from "./board.js"
import { FenError, makeFen, parseFen } from "./fen.js"
import { defaultSetup, ROOK_CORNERS, Setup } from "./setup.js"
import { SquareSet } from "./squareSet.js"
import { CASTLING_SIDES, Color, Move, Piece, Square } from "./types.js"
import { isSquare, makeSquare, opposite } from "./util.js"

export enum IllegalMove {
    InvalidSquare = 'ERR_INVALID_SQUARE',
    NoPieceAtSource = 'ERR_NO_PIECE_AT_SOURCE',
    WrongSideToMove = 'ERR_WRONG_SIDE_TO_MOVE',
    IllegalTarget = 'ERR_ILLEGAL_TARGET',
}


export class IllegalMoveError extends Error {
    readonly code: IllegalMove

    constructor(code: IllegalMove, detail?: string) {
        super(detail ? `${code}: ${detail}` : code)
        this.name = 'IllegalMoveError'
        this.code = code
    }
}


const discardCorner = (castlingRights: SquareSet, color: Color, square: Square): SquareSet => {
    for (const side of CASTLING_SIDES) {
        if (ROOK_CORNERS[color][side] === square) return castlingRights.without(square)
    }
    return castlingRights
}


/**
 * A chess position owned by a single caller.
 *
 * Destinations are pseudo-legal: they follow piece geometry, blocking and
 * captures, but moves that leave the own king in check are not removed.
 * Castling, en passant captures and promotion are not played.
 */
export class Position {

    board: Board
    turn: Color
    castlingRights: SquareSet
    epSquare?: Square
    halfmoves: number
    fullmoves: number

    private constructor(setup: Setup) {
        this.board = setup.board.clone()
        this.turn = setup.turn
        this.castlingRights = setup.castlingRights
        this.epSquare = setup.epSquare
        this.halfmoves = setup.halfmoves
        this.fullmoves = setup.fullmoves
    }

    static default(): Position {
        return new Position(defaultSetup())
    }

    static fromSetup(setup: Setup): Position {
        return new Position(setup)
    }

    static fromFen(fen: string): Result<Position, FenError> {
        return parseFen(fen).map(setup => Position.fromSetup(setup))
    }

    clone(): Position {
        return Position.fromSetup(this.toSetup())
    }

    toSetup(): Setup {
        return {
            board: this.board.clone(),
            turn: this.turn,
            castlingRights: this.castlingRights,
            epSquare: this.epSquare,
            halfmoves: this.halfmoves,
            fullmoves: this.fullmoves
        }
    }

    toFen(): string {
        return makeFen(this.toSetup())
    }

    /**
     * Pseudo-legal destinations of the piece on `square`, whichever side it
     * belongs to, or `undefined` if there is no piece.
     */
    possibleMoves(square: Square): Square[] | undefined {
        if (!isSquare(square)) return
        return possibleMoves(this.board, square)
    }

    /**
     * Destinations of every piece of the side to move.
     */
    allDests(): Map<Square, Square[]> {
        const d = new Map<Square, Square[]>()
        for (const [square, piece] of this.board) {
            if (piece.color !== this.turn) continue
            d.set(square, possibleMoves(this.board, square) ?? [])
        }
        return d
    }

    isLegal(move: Move): boolean {
        return this.validate(move.from, move.to).isOk
    }

    private validate(from: Square, to: Square): Result<Piece, IllegalMoveError> {
        if (!isSquare(from) || !isSquare(to)) {
            return Result.err(new IllegalMoveError(IllegalMove.InvalidSquare, `${from} -> ${to}`))
        }
        const piece = this.board.get(from)
        if (!piece) return Result.err(new IllegalMoveError(IllegalMove.NoPieceAtSource, makeSquare(from)))
        if (piece.color !== this.turn) {
            return Result.err(new IllegalMoveError(IllegalMove.WrongSideToMove, `${this.turn} to move`))
        }
        if (!possibleMoves(this.board, from)?.includes(to)) {
            return Result.err(new IllegalMoveError(IllegalMove.IllegalTarget, `${makeSquare(from)} -> ${makeSquare(to)}`))
        }
        return Result.ok(piece)
    }

    /**
     * Moves the piece on `from` to `to`, capturing whatever stands there.
     * The position is left untouched when the move is rejected.
     */
    applyMove(from: Square, to: Square): Result<undefined, IllegalMoveError> {
        return this.validate(from, to).map(piece => {
            const turn = this.turn

            this.board.take(from)
            const captured = this.board.set(to, piece)

            this.epSquare = undefined
            this.halfmoves += 1
            if (turn === 'black') this.fullmoves += 1
            this.turn = opposite(turn)

            if (piece.role === 'pawn') {
                this.halfmoves = 0
                if (Math.abs(to - from) === 16) this.epSquare = (from + to) >> 1
            } else if (piece.role === 'rook') {
                this.castlingRights = discardCorner(this.castlingRights, turn, from)
            } else if (piece.role === 'king') {
                for (const side of CASTLING_SIDES) {
                    this.castlingRights = this.castlingRights.without(ROOK_CORNERS[turn][side])
                }
            }

            if (captured) {
                this.halfmoves = 0
                if (captured.role === 'rook') {
                    this.castlingRights = discardCorner(this.castlingRights, captured.color, to)
                }
            }

            return undefined
        })
    }

    play(move: Move): Result<undefined, IllegalMoveError> {
        return this.applyMove(move.from, move.to)
    }
}
