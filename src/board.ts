import { SquareSet } from './squareSet.js';
import { ByColor, ByRole, Color, COLORS, Piece, Role, ROLES, Square } from './types.js';
import { isSquare } from './util.js';

const emptyMasks = (): ByRole<SquareSet> => ({
    pawn: SquareSet.empty(),
    knight: SquareSet.empty(),
    bishop: SquareSet.empty(),
    rook: SquareSet.empty(),
    queen: SquareSet.empty(),
    king: SquareSet.empty(),
})


/**
 * Piece positions on a board, one occupancy mask per role and color.
 *
 * The twelve masks are kept pairwise disjoint: placing a piece first
 * clears its square in every mask.
 */
export class Board implements Iterable<[Square, Piece]> {

    private masks: ByColor<ByRole<SquareSet>>

    private constructor(masks: ByColor<ByRole<SquareSet>>) {
        this.masks = masks
    }

    static default(): Board {
        return new Board({
            white: {
                pawn: new SquareSet(0xff00, 0),
                knight: new SquareSet(0x42, 0),
                bishop: new SquareSet(0x24, 0),
                rook: new SquareSet(0x81, 0),
                queen: new SquareSet(0x08, 0),
                king: new SquareSet(0x10, 0),
            },
            black: {
                pawn: new SquareSet(0, 0x00ff_0000),
                knight: new SquareSet(0, 0x4200_0000),
                bishop: new SquareSet(0, 0x2400_0000),
                rook: new SquareSet(0, 0x8100_0000),
                queen: new SquareSet(0, 0x0800_0000),
                king: new SquareSet(0, 0x1000_0000),
            },
        })
    }

    static empty(): Board {
        return new Board({ white: emptyMasks(), black: emptyMasks() })
    }

    clone(): Board {
        return new Board({ white: { ...this.masks.white }, black: { ...this.masks.black } })
    }

    pieces(color: Color, role: Role): SquareSet {
        return this.masks[color][role]
    }

    /**
     * Squares occupied by `color`, or by either side when no color is given.
     */
    occupancy(color?: Color): SquareSet {
        if (!color) return this.occupancy('white').union(this.occupancy('black'))
        const masks = this.masks[color]
        let occupied = SquareSet.empty()
        for (const role of ROLES) occupied = occupied.union(masks[role])
        return occupied
    }

    get(square: Square): Piece | undefined {
        if (!isSquare(square)) return
        for (const color of COLORS) {
            for (const role of ROLES) {
                if (this.masks[color][role].has(square)) return { role, color }
            }
        }
        return
    }

    getColor(square: Square): Color | undefined {
        return this.get(square)?.color
    }

    getRole(square: Square): Role | undefined {
        return this.get(square)?.role
    }

    has(square: Square): boolean {
        return this.occupancy().has(square)
    }

    kingOf(color: Color): Square | undefined {
        const king = this.masks[color].king
        return king.size() === 1 ? king.first() : undefined
    }

    /**
     * Removes and returns the piece on `square`, if any.
     */
    take(square: Square): Piece | undefined {
        const piece = this.get(square)
        if (piece) {
            this.masks[piece.color][piece.role] = this.masks[piece.color][piece.role].without(square)
        }
        return piece
    }

    /**
     * Puts `piece` on `square` and returns the piece it replaced, if any.
     */
    set(square: Square, piece: Piece): Piece | undefined {
        const old = this.take(square)
        this.masks[piece.color][piece.role] = this.masks[piece.color][piece.role].with(square)
        return old
    }

    *[Symbol.iterator](): Iterator<[Square, Piece]> {
        for (const color of COLORS) {
            for (const role of ROLES) {
                for (const square of this.masks[color][role]) yield [square, { role, color }]
            }
        }
    }
}


export const boardEquals = (left: Board, right: Board): boolean =>
    COLORS.every(color => ROLES.every(role => left.pieces(color, role).equals(right.pieces(color, role))))
