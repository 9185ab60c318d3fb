import { expect, it } from 'vitest'
import {
    EMPTY_FEN,
    FenError,
    INITIAL_EPD,
    INITIAL_FEN,
    InvalidFen,
    UnsupportedPieceError,
    defaultSetup,
    makeFen,
    makePiece,
    parseFen,
    parsePiece,
    setupEquals,
} from '../src/index.js'

const fenError = (fen: string): FenError => {
    const result = parseFen(fen)
    if (result.isOk) throw new Error(`expected ${fen} to be rejected`)
    return result.error
}

it('parses the initial position', () => {
    const setup = parseFen(INITIAL_FEN).unwrap()
    expect(setupEquals(setup, defaultSetup())).toBe(true)
    expect(makeFen(setup)).toBe(INITIAL_FEN)
    expect(makeFen(setup, { epd: true })).toBe(INITIAL_EPD)
})

it('round trips positions', () => {
    for (const fen of [
        INITIAL_FEN,
        EMPTY_FEN,
        'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq e6 0 2',
        'r1bqk2r/pppp1ppp/2n2n2/2b1p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4',
        '8/5k2/8/3Pp3/8/8/2K5/8 w - e6 0 51',
        '4k3/8/8/8/8/8/8/4K2R b K - 12 40',
    ]) {
        expect(makeFen(parseFen(fen).unwrap())).toBe(fen)
    }
})

it('canonicalizes castling rights and counters', () => {
    expect(makeFen(parseFen('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w qkQK - 0 1').unwrap())).toBe(INITIAL_FEN)
    expect(makeFen(parseFen('r3k2r/8/8/8/8/8/8/R3K2R b qK e3 5 20').unwrap())).toBe('r3k2r/8/8/8/8/8/8/R3K2R b Kq e3 5 20')
    expect(makeFen(parseFen('  8/8/8/8/8/8/8/8 \t b - -  3 0  ').unwrap())).toBe('8/8/8/8/8/8/8/8 b - - 3 1')
})

it('requires all six fields', () => {
    expect(fenError('8/8/8/8/8/8/8/8').message).toBe('ERR_FEN: expected 6 fields, got 1')
    expect(fenError('8/8/8/8/8/8/8/8 w - - 0').message).toBe('ERR_FEN: expected 6 fields, got 5')
    expect(fenError(INITIAL_EPD).code).toBe(InvalidFen.Fen)
    expect(fenError('8/8/8/8/8/8/8/8_b_-_-_3_1').code).toBe(InvalidFen.Fen)
})

it('parses four fields as EPD on request', () => {
    expect(makeFen(parseFen(INITIAL_EPD, { epd: true }).unwrap())).toBe(INITIAL_FEN)
    expect(makeFen(parseFen('8/8/8/8/8/8/8/8 b - e3', { epd: true }).unwrap())).toBe('8/8/8/8/8/8/8/8 b - e3 0 1')

    const err = parseFen(INITIAL_FEN, { epd: true })
    expect(err.isErr && err.error.message).toBe('ERR_FEN: expected 4 fields, got 6')
})

it('rejects a wrong number of ranks', () => {
    const err = fenError('rnbqkbnr/pppppppp/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1')
    expect(err.code).toBe(InvalidFen.Board)
    expect(err.message).toBe('ERR_BOARD: expected 8 ranks, got 7')

    expect(fenError('8/8/8/8/8/8/8/8/8 w - - 0 1').code).toBe(InvalidFen.Board)
})

it('rejects ranks that do not add up to eight files', () => {
    expect(fenError('rnbqkbnr/ppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1').message).toBe('ERR_BOARD: rank 7 has 7 files')
    expect(fenError('rnbqkbnr/ppppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1').message).toBe('ERR_BOARD: rank 7 has 9 files')
    expect(fenError('rnbqkbnr/pppppppp/9/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1').message).toBe("ERR_BOARD: invalid empty run '9'")
    expect(fenError('rnbqkbnr/pppppppp/44/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1').message).toBe('ERR_BOARD: consecutive digits on rank 6')
})

it('rejects unknown pieces', () => {
    const err = fenError('rnbqkbnr/ppppxppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1')
    expect(err).toBeInstanceOf(UnsupportedPieceError)
    expect(err.code).toBe(InvalidFen.Board)
    expect(err.message).toBe("ERR_BOARD: unsupported piece 'x'")
})

it('rejects bad castling rights', () => {
    expect(fenError('r3k2r/8/8/8/8/8/8/R3K2R w KK - 0 1').message).toBe("ERR_CASTLING: duplicate right 'K'")
    expect(fenError('r3k2r/8/8/8/8/8/8/R3K2R w KQkqK - 0 1').code).toBe(InvalidFen.Castling)
    expect(fenError('r3k2r/8/8/8/8/8/8/R3K2R w Ka - 0 1').message).toBe("ERR_CASTLING: invalid right 'a'")
})

it('rejects bad turn, en passant and counters', () => {
    expect(fenError('8/8/8/8/8/8/8/8 x - - 0 1').code).toBe(InvalidFen.Turn)
    expect(fenError('8/8/8/8/8/8/8/8 w - z9 0 1').code).toBe(InvalidFen.EpSquare)
    expect(fenError('8/8/8/8/8/8/8/8 w - - a 1').code).toBe(InvalidFen.Halfmoves)
    expect(fenError('8/8/8/8/8/8/8/8 w - - 0 -1').code).toBe(InvalidFen.Fullmoves)
    expect(fenError('8/8/8/8/8/8/8/8 w - - 10000 1').message).toBe("ERR_HALFMOVES: invalid counter '10000'")
    expect(fenError('8/8/8/8/8/8/8/8 w - - 0 1 extra').code).toBe(InvalidFen.Fen)
    expect(fenError('   ').message).toBe('ERR_FEN: expected 6 fields, got 0')
})

it('reports a bad board before a bad turn', () => {
    expect(fenError('8/8/8 x - - 0 1').code).toBe(InvalidFen.Board)
    expect(fenError('8/8/8/8/8/8/8/8 x - - 0 1').message).toBe("ERR_TURN: expected 'w' or 'b', got 'x'")
})

it('parses and makes single pieces', () => {
    expect(parsePiece('Q')).toEqual({ role: 'queen', color: 'white' })
    expect(parsePiece('n')).toEqual({ role: 'knight', color: 'black' })
    expect(parsePiece('x')).toBeUndefined()
    expect(parsePiece('QQ')).toBeUndefined()
    expect(makePiece({ role: 'king', color: 'black' })).toBe('k')
    expect(makePiece({ role: 'bishop', color: 'white' })).toBe('B')
})
