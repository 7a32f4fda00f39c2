import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as path from 'node:path';
import { convert } from '../converter.js';
import { loadPathDataFile, saveLottieFile, isFileNotFound } from '../io/path-io.js';
import * as errors from '../errors.js';
import { type LottieDocument, type ShapeList } from '../types/lottie.js';

/**
 * Zod input schema for the `svg_path_to_lottie` tool.
 */
const convertInputSchema = {
    path_data: z.string().optional().describe('SVG path "d" string, e.g. "M0 0 C10 0 10 10 0 10 Z"'),
    path_file: z.string().optional().describe('Text file holding the path data (instead of path_data)'),
    width: z.number().optional().describe('Canvas width (default 24)'),
    height: z.number().optional().describe('Canvas height (default 24)'),
    stroke_width: z.number().optional().describe('Stroke width (default 2)'),
    stroke_color: z.tuple([z.number(), z.number(), z.number(), z.number()]).optional().describe(
        'Stroke color [r, g, b, a], each 0-1 (default opaque black)'
    ),
    name: z.string().optional().describe('Document name (default "SVG to Lottie")'),
    frame_rate: z.number().optional().describe('Frames per second; the animation lasts one second (default 24)'),
    shapes_only: z.boolean().optional().describe('Return per-subpath geometry instead of a full Lottie document'),
    strict: z.boolean().optional().describe('Reject malformed data and Q/T/A commands instead of skipping them'),
    output_path: z.string().optional().describe('Write the JSON to this file instead of returning it'),
    pretty: z.boolean().optional().describe('Indent the JSON output'),
};

/**
 * Registers the `svg_path_to_lottie` tool on the MCP server.
 */
export function registerConvertTool(server: McpServer): void {
    server.registerTool(
        'svg_path_to_lottie',
        {
            title: 'SVG path to Lottie',
            description: 'Convert an SVG path "d" string into a Lottie shape layer document (or shapes only), preserving cubic and smooth-cubic bezier handles. Supports M, L, H, V, C, S, Z; Q, T and A segments are dropped (or rejected in strict mode).',
            inputSchema: convertInputSchema,
        },
        async (args) => {
            const pathData = await readPathData(args.path_data, args.path_file);
            if (typeof pathData !== 'string') {
                return pathData;
            }
            if (pathData.length === 0) {
                return errors.emptyPathData();
            }

            let result: LottieDocument | ShapeList;
            try {
                result = convert(pathData, {
                    width: args.width,
                    height: args.height,
                    strokeWidth: args.stroke_width,
                    strokeColor: args.stroke_color,
                    frameRate: args.frame_rate,
                    name: args.name,
                    shapesOnly: args.shapes_only,
                    mode: args.strict ? 'strict' : 'lenient',
                });
            } catch (e: unknown) {
                return conversionError(e);
            }

            if (args.output_path !== undefined) {
                const resolved = path.resolve(args.output_path);
                try {
                    await saveLottieFile(resolved, result, args.pretty ?? false);
                } catch {
                    return errors.cannotWritePath(resolved);
                }

                const subpaths = countSubpaths(result);
                return {
                    content: [{
                        type: 'text' as const,
                        text: JSON.stringify({
                            message: `Wrote ${String(subpaths)} subpath(s) to ${resolved}.`,
                            path: resolved,
                            subpaths,
                        }),
                    }],
                };
            }

            return {
                content: [{
                    type: 'text' as const,
                    text: JSON.stringify(result, null, args.pretty ? 2 : undefined),
                }],
            };
        },
    );
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function readPathData(
    pathData: string | undefined,
    pathFile: string | undefined,
): Promise<string | errors.DomainErrorResponse> {
    if ((pathData === undefined) === (pathFile === undefined)) {
        return errors.noPathData();
    }
    if (pathData !== undefined) {
        return pathData.trim();
    }

    const resolved = path.resolve(pathFile ?? '');
    try {
        return await loadPathDataFile(resolved);
    } catch (e: unknown) {
        if (isFileNotFound(e)) {
            return errors.pathFileNotFound(resolved);
        }
        return errors.domainError(`Cannot read path data file: ${e instanceof Error ? e.message : String(e)}`);
    }
}

function conversionError(e: unknown): errors.DomainErrorResponse {
    if (e instanceof errors.MalformedPathError) return errors.malformedPath(e);
    if (e instanceof errors.UnsupportedCommandError) return errors.unsupportedCommand(e);
    if (e instanceof errors.InvalidConfigError) return errors.invalidConfig(e);
    return errors.domainError(e instanceof Error ? e.message : String(e));
}

function countSubpaths(result: LottieDocument | ShapeList): number {
    if (Array.isArray(result)) {
        return result.length;
    }
    return result.layers[0].shapes[0].it.filter((item) => item.ty === 'sh').length;
}
