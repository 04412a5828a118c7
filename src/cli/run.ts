import { Dice } from '../model/dice';
import { generateWorld } from '../model/generateWorld';
import { describeWorld } from '../ui/report';
import { PROG, UsageError, help, parseWorldArgs, usage } from './args';

export interface Output {
  out: (text: string) => void;
  err: (text: string) => void;
}

// Exit codes follow the usual argument-parser convention
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * parse -> validate -> compute -> roll -> format -> print.
 * Nothing is printed to `out` unless the whole world was generated.
 */
export function run(argv: readonly string[], io: Output): number {
  try {
    const parsed = parseWorldArgs(argv);
    if (parsed.kind === 'help') {
      io.out(help());
      return EXIT_OK;
    }

    const dice = parsed.seed === undefined ? new Dice() : new Dice(parsed.seed);
    io.out(describeWorld(generateWorld(parsed.inputs, dice)));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`${usage()}\n${PROG}: error: ${err.message}`);
      return EXIT_USAGE;
    }
    io.err(`${PROG}: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_FAILURE;
  }
}
