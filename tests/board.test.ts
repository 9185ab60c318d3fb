import { expect, it } from 'vitest'
import { Board, boardEquals, COLORS, ROLES, SquareSet } from '../src/index.js'

it('knows the initial position', () => {
    const board = Board.default()
    expect(board.get(4)).toEqual({ role: 'king', color: 'white' })
    expect(board.get(60)).toEqual({ role: 'king', color: 'black' })
    expect(board.get(3)).toEqual({ role: 'queen', color: 'white' })
    expect(board.get(57)).toEqual({ role: 'knight', color: 'black' })
    expect(board.get(27)).toBeUndefined()
    expect(board.kingOf('white')).toBe(4)
    expect(board.kingOf('black')).toBe(60)
})

it('computes occupancy per color and overall', () => {
    const board = Board.default()
    expect(board.occupancy('white').equals(new SquareSet(0xffff, 0))).toBe(true)
    expect(board.occupancy('black').equals(new SquareSet(0, 0xffff_0000))).toBe(true)
    expect(board.occupancy().size()).toBe(32)
    expect(board.has(12)).toBe(true)
    expect(board.has(28)).toBe(false)
})

it('keeps masks disjoint when replacing a piece', () => {
    const board = Board.default()
    expect(board.set(12, { role: 'queen', color: 'black' })).toEqual({ role: 'pawn', color: 'white' })
    expect(board.pieces('white', 'pawn').has(12)).toBe(false)
    expect(board.get(12)).toEqual({ role: 'queen', color: 'black' })

    let total = 0
    for (const color of COLORS) {
        for (const role of ROLES) total += board.pieces(color, role).size()
    }
    expect(total).toBe(board.occupancy().size())
})

it('takes pieces off the board', () => {
    const board = Board.default()
    expect(board.take(0)).toEqual({ role: 'rook', color: 'white' })
    expect(board.take(0)).toBeUndefined()
    expect(board.getRole(0)).toBeUndefined()
    expect(board.getColor(63)).toBe('black')
    expect(Array.from(board)).toHaveLength(31)
})

it('clones independently', () => {
    const board = Board.default()
    const copy = board.clone()
    expect(boardEquals(board, copy)).toBe(true)
    copy.take(12)
    expect(boardEquals(board, copy)).toBe(false)
    expect(board.get(12)).toEqual({ role: 'pawn', color: 'white' })
})

it('has no king to report without exactly one', () => {
    const board = Board.empty()
    expect(board.kingOf('white')).toBeUndefined()
    board.set(0, { role: 'king', color: 'white' })
    board.set(1, { role: 'king', color: 'white' })
    expect(board.kingOf('white')).toBeUndefined()
})
