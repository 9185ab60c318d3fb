import { parseArgs } from 'node:util';
import { Position } from './chess.js';
import * as debug from './debug.js';
import { evaluate } from './evaluate.js';
import { defined, makeSquare, parseCoordinates, parseSquare } from './util.js';

export const USAGE = `Usage: bitchess --fen <FEN> [options]

Options:
  -f, --fen <FEN>           position to work on (required)
  -m, --move <from:to>      play a move first, e.g. e2:e4
  -s, --show                print the board
  -e, --evaluate            print the material balance, positive favours white
  -g, --get-moves <square>  print the destinations of the piece on <square>
  -p, --print-fen           print the FEN of the resulting position
  -h, --help                print this help`;

export interface Io {
  log(message: string): void;
  error(message: string): void;
}

class ArgumentError extends Error {}

const parseCommandLine = (args: string[]) => {
  try {
    return parseArgs({
      args,
      options: {
        fen: { type: 'string', short: 'f' },
        move: { type: 'string', short: 'm' },
        show: { type: 'boolean', short: 's' },
        evaluate: { type: 'boolean', short: 'e' },
        'get-moves': { type: 'string', short: 'g' },
        'print-fen': { type: 'boolean', short: 'p' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
    }).values;
  } catch (err) {
    throw new ArgumentError(err instanceof Error ? err.message : String(err));
  }
};

const runUnchecked = (args: string[], io: Io): number => {
  const options = parseCommandLine(args);
  if (options.help) {
    io.log(USAGE);
    return 0;
  }
  if (!defined(options.fen)) throw new ArgumentError('--fen is required');

  const parsed = Position.fromFen(options.fen);
  if (parsed.isErr) {
    io.error(`FEN parsing error: ${parsed.error.message}`);
    return 1;
  }
  const pos = parsed.value;

  if (defined(options.move)) {
    const move = parseCoordinates(options.move);
    if (!move) throw new ArgumentError(`invalid move '${options.move}', expected from:to like e2:e4`);
    const played = pos.play(move);
    if (played.isErr) {
      io.error(`Illegal move: ${played.error.message}`);
      return 1;
    }
  }

  if (options.show) io.log(debug.board(pos.board).trimEnd());
  if (options.evaluate) io.log(String(evaluate(pos.board)));
  if (defined(options['get-moves'])) {
    const square = parseSquare(options['get-moves'].toLowerCase());
    if (!defined(square)) throw new ArgumentError(`invalid square '${options['get-moves']}'`);
    io.log((pos.possibleMoves(square) ?? []).map(makeSquare).join(' '));
  }
  if (options['print-fen']) io.log(pos.toFen());

  return 0;
};

/**
 * Runs the command line with `args` (without the node and script paths) and
 * returns the process exit code.
 */
export const run = (args: string[], io: Io = console): number => {
  try {
    return runUnchecked(args, io);
  } catch (err) {
    if (!(err instanceof ArgumentError)) throw err;
    io.error(`Argument error: ${err.message}`);
    return 1;
  }
};
