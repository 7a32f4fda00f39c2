import { type CommandLetter, type ParseMode, type Token } from '../types/path.js';
import { MalformedPathError } from '../errors.js';

const TOKEN_PATTERN = /([MmCcSsLlHhVvQqTtAaZz])|([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)/g;
// SVG path grammar whitespace: space, tab, CR, LF, FF
const SEPARATOR = /[ \t\r\n\f,]/;

function isCommandLetter(value: string): value is CommandLetter {
    return /^[MmCcSsLlHhVvQqTtAaZz]$/.test(value);
}

/**
 * Finds the first character in `source[start, end)` that is neither path whitespace nor a comma.
 * Returns -1 when the range is pure separators.
 */
function firstStrayCharacter(source: string, start: number, end: number): number {
    for (let i = start; i < end; i++) {
        if (!SEPARATOR.test(source[i])) return i;
    }
    return -1;
}

/**
 * Lexes SVG path data into command letters and numeric literals, in source order.
 *
 * In `lenient` mode anything that is not a token (separators, stray symbols, the
 * dangling `e` of `1e`, literals that overflow to Infinity) is dropped and this never
 * throws. In `strict` mode only space, tab, CR, LF, FF and commas may separate tokens.
 *
 * @throws MalformedPathError in strict mode, at the first unparseable character or overflowing number
 */
export function tokenize(pathData: string, mode: ParseMode = 'lenient'): Token[] {
    const tokens: Token[] = [];
    let cursor = 0;

    for (const match of pathData.matchAll(TOKEN_PATTERN)) {
        const offset = match.index ?? cursor;

        if (mode === 'strict') {
            const stray = firstStrayCharacter(pathData, cursor, offset);
            if (stray !== -1) {
                throw new MalformedPathError(`Unexpected character '${pathData[stray]}'.`, stray);
            }
        }

        const [text, letter] = match;
        if (letter !== undefined && isCommandLetter(letter)) {
            tokens.push({ kind: 'command', letter, offset });
        } else {
            const value = Number.parseFloat(text);
            if (Number.isFinite(value)) {
                tokens.push({ kind: 'number', value, offset });
            } else if (mode === 'strict') {
                throw new MalformedPathError(`Number '${text}' is out of range.`, offset);
            }
        }
        cursor = offset + text.length;
    }

    if (mode === 'strict') {
        const stray = firstStrayCharacter(pathData, cursor, pathData.length);
        if (stray !== -1) {
            throw new MalformedPathError(`Unexpected character '${pathData[stray]}'.`, stray);
        }
    }

    return tokens;
}
