import {
    COMMAND_ARITY,
    UNSUPPORTED_COMMANDS,
    commandTypeOf,
    isRelativeLetter,
    type NumberToken,
    type ParseMode,
    type PathCommand,
    type Subpath,
    type Token,
} from '../types/path.js';
import { MalformedPathError, UnsupportedCommandError } from '../errors.js';
import { tokenize } from './tokenize.js';

/**
 * First and last vertex closer than this on both axes are merged on close.
 */
export const CLOSE_TOLERANCE = 0.001;

/**
 * Mutable interpreter state, owned by one parse and passed by reference to each step.
 */
export interface InterpreterState {
    /** Cursor position */
    x: number;
    y: number;
    /** Subpath that drawing commands extend, null until the first one exists */
    current: Subpath | null;
    subpaths: Subpath[];
}

export function createInterpreterState(): InterpreterState {
    return { x: 0, y: 0, current: null, subpaths: [] };
}

// ---------------------------------------------------------------------------
// Grouping tokens into commands
// ---------------------------------------------------------------------------

/**
 * Groups a token stream into command instances of exactly their arity.
 *
 * A command letter followed by several argument groups repeats implicitly; extra
 * pairs after a move become line commands with the move's relativity. Quadratic
 * and arc commands produce no instances: in lenient mode the letter is dropped and
 * its numbers are skipped one at a time like any other stray number.
 *
 * @throws UnsupportedCommandError in strict mode for `Q`, `T` and `A`
 * @throws MalformedPathError in strict mode for stray numbers and truncated argument lists
 */
export function parseCommands(tokens: Token[], mode: ParseMode = 'lenient'): PathCommand[] {
    const commands: PathCommand[] = [];
    let i = 0;

    while (i < tokens.length) {
        const token = tokens[i++];

        if (token.kind === 'number') {
            if (mode === 'strict') {
                throw new MalformedPathError(`Number ${String(token.value)} is not preceded by a command.`, token.offset);
            }
            continue;
        }

        const { letter, offset } = token;
        const type = commandTypeOf(letter);
        const relative = isRelativeLetter(letter);

        if (UNSUPPORTED_COMMANDS.has(type)) {
            if (mode === 'strict') {
                throw new UnsupportedCommandError(letter, offset);
            }
            continue;
        }

        const numbers: NumberToken[] = [];
        while (i < tokens.length) {
            const next = tokens[i];
            if (next.kind !== 'number') break;
            numbers.push(next);
            i++;
        }

        const arity = COMMAND_ARITY[type];

        if (arity === 0) {
            if (mode === 'strict' && numbers.length > 0) {
                throw new MalformedPathError(`'${letter}' takes no arguments.`, numbers[0].offset, letter);
            }
            commands.push({ type, relative, args: [], letter, offset });
            continue;
        }

        const groups = Math.floor(numbers.length / arity);
        if (mode === 'strict' && (groups === 0 || numbers.length % arity !== 0)) {
            const leftover = numbers[groups * arity];
            throw new MalformedPathError(
                `'${letter}' expects ${String(arity)} arguments per segment, got ${String(numbers.length)}.`,
                leftover ? leftover.offset : offset,
                letter,
            );
        }

        for (let g = 0; g < groups; g++) {
            const args = numbers.slice(g * arity, (g + 1) * arity).map((n) => n.value);
            commands.push({
                type: type === 'move' && g > 0 ? 'line' : type,
                relative,
                args,
                letter,
                offset: g === 0 ? offset : numbers[g * arity].offset,
            });
        }
    }

    return commands;
}

// ---------------------------------------------------------------------------
// Subpath mutation
// ---------------------------------------------------------------------------

function startSubpath(state: InterpreterState, x: number, y: number): Subpath {
    const subpath: Subpath = {
        vertices: [[x, y]],
        inTangents: [[0, 0]],
        outTangents: [[0, 0]],
        closed: false,
    };
    state.x = x;
    state.y = y;
    state.current = subpath;
    state.subpaths.push(subpath);
    return subpath;
}

/**
 * The subpath to draw into. A drawing command with no preceding move starts one at the cursor.
 */
function activeSubpath(state: InterpreterState): Subpath {
    return state.current ?? startSubpath(state, state.x, state.y);
}

function appendLine(state: InterpreterState, endX: number, endY: number): void {
    const subpath = activeSubpath(state);
    subpath.outTangents[subpath.outTangents.length - 1] = [0, 0];
    state.x = endX;
    state.y = endY;
    subpath.vertices.push([endX, endY]);
    subpath.inTangents.push([0, 0]);
    subpath.outTangents.push([0, 0]);
}

function appendCurve(
    state: InterpreterState,
    cp1x: number, cp1y: number,
    cp2x: number, cp2y: number,
    endX: number, endY: number,
): void {
    const subpath = activeSubpath(state);
    subpath.outTangents[subpath.outTangents.length - 1] = [cp1x - state.x, cp1y - state.y];
    state.x = endX;
    state.y = endY;
    subpath.vertices.push([endX, endY]);
    subpath.inTangents.push([cp2x - endX, cp2y - endY]);
    subpath.outTangents.push([0, 0]);
}

function closeSubpath(state: InterpreterState): void {
    const subpath = state.current;
    if (!subpath) return;

    subpath.closed = true;
    const first = subpath.vertices[0];
    const lastIndex = subpath.vertices.length - 1;
    const last = subpath.vertices[lastIndex];

    // The explicit return to the start duplicates vertex 0; fold its incoming handle into vertex 0
    if (
        lastIndex > 0 &&
        Math.abs(first[0] - last[0]) < CLOSE_TOLERANCE &&
        Math.abs(first[1] - last[1]) < CLOSE_TOLERANCE
    ) {
        subpath.inTangents[0] = subpath.inTangents[lastIndex];
        subpath.vertices.pop();
        subpath.inTangents.pop();
        subpath.outTangents.pop();
    }

    state.x = first[0];
    state.y = first[1];
}

/**
 * Applies one command instance to the state.
 */
export function applyCommand(state: InterpreterState, command: PathCommand): void {
    const { args, relative } = command;
    const ox = relative ? state.x : 0;
    const oy = relative ? state.y : 0;

    switch (command.type) {
        case 'move':
            startSubpath(state, ox + args[0], oy + args[1]);
            break;
        case 'line':
            appendLine(state, ox + args[0], oy + args[1]);
            break;
        case 'horizontal':
            appendLine(state, ox + args[0], state.y);
            break;
        case 'vertical':
            appendLine(state, state.x, oy + args[0]);
            break;
        case 'cubic':
            appendCurve(
                state,
                ox + args[0], oy + args[1],
                ox + args[2], oy + args[3],
                ox + args[4], oy + args[5],
            );
            break;
        case 'smoothCubic': {
            // First control point mirrors the stored incoming handle about the cursor
            const subpath = activeSubpath(state);
            const previousIn = subpath.inTangents[subpath.inTangents.length - 1];
            appendCurve(
                state,
                state.x - previousIn[0], state.y - previousIn[1],
                ox + args[0], oy + args[1],
                ox + args[2], oy + args[3],
            );
            break;
        }
        case 'close':
            closeSubpath(state);
            break;
        case 'quadratic':
        case 'smoothQuadratic':
        case 'arc':
            // Never emitted by parseCommands; no conversion exists for these segments
            break;
    }
}

/**
 * Runs a command list against a fresh state and returns the subpaths in first-seen order.
 */
export function interpretCommands(commands: PathCommand[]): Subpath[] {
    const state = createInterpreterState();
    for (const command of commands) {
        applyCommand(state, command);
    }
    return state.subpaths;
}

/**
 * Parses SVG path data into subpaths with relative bezier handles.
 */
export function parseSVGPath(pathData: string, mode: ParseMode = 'lenient'): Subpath[] {
    return interpretCommands(parseCommands(tokenize(pathData, mode), mode));
}
