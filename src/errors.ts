/**
 * Shared Error Factory for the path converter.
 *
 * Two halves live here:
 *  - thrown error classes raised by the core (strict-mode parse failures, bad config),
 *  - pure functions returning the structured MCP error response shape, so tool handlers can do:
 *      return errors.pathFileNotFound(path);
 */

import { type CommandLetter } from './types/path.js';

// ----------------------------------------------------------------------------
// thrown errors
// ----------------------------------------------------------------------------

/**
 * Base class for problems found in path data. Only raised in strict mode.
 */
export class PathDataError extends Error {
    /** Character index in the path data where the problem was detected */
    readonly offset: number;
    /** Command in effect at the point of detection, if any */
    readonly command: CommandLetter | null;

    constructor(message: string, offset: number, command: CommandLetter | null) {
        super(message);
        this.name = 'PathDataError';
        this.offset = offset;
        this.command = command;
    }
}

/**
 * Unparseable characters, stray numbers, or a truncated argument list.
 */
export class MalformedPathError extends PathDataError {
    constructor(message: string, offset: number, command: CommandLetter | null = null) {
        super(message, offset, command);
        this.name = 'MalformedPathError';
    }
}

/**
 * A quadratic (`Q`/`T`) or arc (`A`) command, which has no conversion.
 */
export class UnsupportedCommandError extends PathDataError {
    constructor(command: CommandLetter, offset: number) {
        super(`Unsupported path command '${command}' at offset ${String(offset)}.`, offset, command);
        this.name = 'UnsupportedCommandError';
    }
}

export class InvalidConfigError extends Error {
    constructor(message: string) {
        super(`Invalid converter configuration: ${message}`);
        this.name = 'InvalidConfigError';
    }
}

// ----------------------------------------------------------------------------
// MCP error responses
// ----------------------------------------------------------------------------

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

// ----------------------------------------------------------------------------
// input
// ----------------------------------------------------------------------------

export function noPathData(): DomainErrorResponse {
    return domainError('Provide exactly one of "path_data" or "path_file".');
}

export function emptyPathData(): DomainErrorResponse {
    return domainError('Path data is empty. Provide an SVG path "d" string such as "M0 0 L10 10".');
}

export function pathFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Path data file not found: ${path}`);
}

// ----------------------------------------------------------------------------
// conversion
// ----------------------------------------------------------------------------

export function malformedPath(error: MalformedPathError): DomainErrorResponse {
    const where = error.command ? ` (command '${error.command}')` : '';
    return domainError(`Malformed path data at offset ${String(error.offset)}${where}: ${error.message}`);
}

export function unsupportedCommand(error: UnsupportedCommandError): DomainErrorResponse {
    return domainError(
        `Path command '${String(error.command)}' at offset ${String(error.offset)} cannot be converted. Quadratic and arc segments are not supported; rewrite them as cubic curves or disable strict mode to drop them.`,
    );
}

export function invalidConfig(error: InvalidConfigError): DomainErrorResponse {
    return domainError(error.message);
}

// ----------------------------------------------------------------------------
// output
// ----------------------------------------------------------------------------

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}
