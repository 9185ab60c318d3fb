import { Position } from "./chess.js"
import { SquareName } from "./types.js"
import { makeSquare } from "./util.js"


/**
 * Computes the move destinations of the side to move in the format used by
 * chessground. Pieces without destinations are left out.
 */
export const chessgroundDests = (pos: Position): Map<SquareName, SquareName[]> => {

    const res = new Map<SquareName, SquareName[]>()

    for (const [from, squares] of pos.allDests()) {
        if (squares.length > 0) res.set(makeSquare(from), squares.map(makeSquare))
    }

    return res
}
