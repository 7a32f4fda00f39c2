/**
 * SVG path data to Lottie conversion.
 *
 * The pipeline is tokenizer -> path interpreter -> shape serializer. Every call is
 * independent: nothing is cached and no state survives between calls.
 *
 * @example
 *   const doc = convertToDocument('M0 0 C10 0 10 10 0 10', { width: 48, height: 48 });
 *   const shapes = convertShapesOnly('M0 0 L10 0 L10 10 Z');
 */

import { parseSVGPath } from './algorithms/path-interpreter.js';
import { buildDocument, buildShapeList } from './algorithms/lottie-serializer.js';
import { resolveConfig, type ConverterOptions } from './types/config.js';
import { type LottieDocument, type ShapeList } from './types/lottie.js';

/**
 * Converts path data to a full Lottie document, or to a shape list when `shapesOnly` is set.
 *
 * @throws InvalidConfigError for out-of-range options
 * @throws PathDataError subclasses in strict mode
 */
export function convert(pathData: string, options: ConverterOptions = {}): LottieDocument | ShapeList {
    const config = resolveConfig(options);
    const subpaths = parseSVGPath(pathData, config.mode);
    return config.shapesOnly ? buildShapeList(subpaths) : buildDocument(subpaths, config);
}

export function convertToDocument(pathData: string, options: ConverterOptions = {}): LottieDocument {
    const config = resolveConfig(options);
    return buildDocument(parseSVGPath(pathData, config.mode), config);
}

/**
 * Raw per-subpath geometry. Only `mode` is read and validated; layout options are ignored.
 */
export function convertShapesOnly(pathData: string, options: ConverterOptions = {}): ShapeList {
    const config = resolveConfig({ mode: options.mode });
    return buildShapeList(parseSVGPath(pathData, config.mode));
}

export { parseSVGPath } from './algorithms/path-interpreter.js';
export { tokenize } from './algorithms/tokenize.js';
export { roundCoordinate } from './algorithms/lottie-serializer.js';
export { resolveConfig, type ConverterConfig, type ConverterOptions } from './types/config.js';
export {
    PathDataError,
    MalformedPathError,
    UnsupportedCommandError,
    InvalidConfigError,
} from './errors.js';
export type * from './types/lottie.js';
export type * from './types/path.js';
