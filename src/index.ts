export * from './types.js'
export * from './util.js'
export * from './squareSet.js'
export * from './attacks.js'
export * from './board.js'

export * from './setup.js'

export * from './chess.js'

export * from './evaluate.js'


export * as compat from './compat.js'


export * as debug from './debug.js'
export * from './fen.js'
