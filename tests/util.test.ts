import { expect, it } from 'vitest'
import { makeCoordinates, makeSquare, moveEquals, parseCoordinates, parseSquare, squareFile, squareFromCoords, squareRank } from '../src/index.js'

it('names squares', () => {
    expect(parseSquare('a1')).toBe(0)
    expect(parseSquare('h8')).toBe(63)
    expect(parseSquare('e4')).toBe(28)
    expect(parseSquare('i1')).toBeUndefined()
    expect(parseSquare('a9')).toBeUndefined()
    expect(parseSquare('e')).toBeUndefined()
    expect(makeSquare(12)).toBe('e2')
    expect(squareFile(12)).toBe(4)
    expect(squareRank(12)).toBe(1)
    expect(squareFromCoords(8, 0)).toBeUndefined()
})

it('parses coordinate moves', () => {
    expect(parseCoordinates('e2:e4')).toEqual({ from: 12, to: 28 })
    expect(parseCoordinates('E2:E4')).toEqual({ from: 12, to: 28 })
    expect(parseCoordinates('e2e4')).toBeUndefined()
    expect(parseCoordinates('e2:e9')).toBeUndefined()
    expect(parseCoordinates('e2:e4:e5')).toBeUndefined()
    expect(makeCoordinates({ from: 6, to: 21 })).toBe('g1:f3')
    expect(moveEquals({ from: 6, to: 21 }, { from: 6, to: 21 })).toBe(true)
})
