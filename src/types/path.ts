/**
 * Core types for SVG path data.
 *
 * Path data is lexed into tokens, grouped into commands, and interpreted into
 * subpaths whose bezier handles are stored relative to their anchor vertex.
 */

/**
 * A 2D coordinate pair [x, y] in the path's own coordinate space.
 */
export type Point = [number, number];

/**
 * Every command letter the tokenizer recognizes.
 */
export type CommandLetter =
  | 'M' | 'm' | 'C' | 'c' | 'S' | 's' | 'L' | 'l' | 'H' | 'h'
  | 'V' | 'v' | 'Q' | 'q' | 'T' | 't' | 'A' | 'a' | 'Z' | 'z';

/**
 * How malformed or unsupported input is treated.
 * `lenient` skips what it cannot interpret, `strict` throws at the first problem.
 */
export type ParseMode = 'lenient' | 'strict';

export interface CommandToken {
  kind: 'command';
  letter: CommandLetter;
  /** Character index of the token in the source string */
  offset: number;
}

export interface NumberToken {
  kind: 'number';
  value: number;
  offset: number;
}

export type Token = CommandToken | NumberToken;

export type CommandType =
  | 'move'
  | 'line'
  | 'horizontal'
  | 'vertical'
  | 'cubic'
  | 'smoothCubic'
  | 'close'
  | 'quadratic'
  | 'smoothQuadratic'
  | 'arc';

/**
 * Number of numeric arguments consumed by one instance of each command.
 */
export const COMMAND_ARITY: Readonly<Record<CommandType, number>> = {
  move: 2,
  line: 2,
  horizontal: 1,
  vertical: 1,
  cubic: 6,
  smoothCubic: 4,
  close: 0,
  quadratic: 4,
  smoothQuadratic: 2,
  arc: 7,
};

/**
 * Commands that are recognized but have no conversion to Lottie geometry.
 */
export const UNSUPPORTED_COMMANDS: ReadonlySet<CommandType> = new Set<CommandType>([
  'quadratic',
  'smoothQuadratic',
  'arc',
]);

const COMMAND_TYPES: Readonly<Record<string, CommandType>> = {
  M: 'move',
  L: 'line',
  H: 'horizontal',
  V: 'vertical',
  C: 'cubic',
  S: 'smoothCubic',
  Z: 'close',
  Q: 'quadratic',
  T: 'smoothQuadratic',
  A: 'arc',
};

export function commandTypeOf(letter: CommandLetter): CommandType {
  return COMMAND_TYPES[letter.toUpperCase()];
}

export function isRelativeLetter(letter: CommandLetter): boolean {
  return letter === letter.toLowerCase();
}

/**
 * One instance of a command with exactly `COMMAND_ARITY[type]` arguments.
 */
export interface PathCommand {
  type: CommandType;
  relative: boolean;
  args: number[];
  /** The letter that introduced this command, as written in the source */
  letter: CommandLetter;
  offset: number;
}

/**
 * One contiguous contour. The three lists always have the same length.
 */
export interface Subpath {
  vertices: Point[];
  /** Incoming handle of each vertex, as `controlPoint - vertex` */
  inTangents: Point[];
  /** Outgoing handle of each vertex, as `controlPoint - vertex` */
  outTangents: Point[];
  closed: boolean;
}
