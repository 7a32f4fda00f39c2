/**
 * Converter configuration.
 *
 * Layout options are consumed only by the serializer; `mode` selects the
 * error policy of the tokenizer and interpreter.
 */

import { z } from 'zod';
import { InvalidConfigError } from '../errors.js';

const positive = z.number().finite().positive();
const channel = z.number().min(0).max(1);

export const converterConfigSchema = z.object({
    width: positive.default(24),
    height: positive.default(24),
    strokeWidth: positive.default(2),
    /** RGBA, each channel 0-1 */
    strokeColor: z.tuple([channel, channel, channel, channel]).default((): [number, number, number, number] => [0, 0, 0, 1]),
    frameRate: positive.default(24),
    shapesOnly: z.boolean().default(false),
    mode: z.enum(['lenient', 'strict']).default('lenient'),
    /** Document name (`nm`) */
    name: z.string().default('SVG to Lottie'),
});

/** Fully resolved configuration, every option present. */
export type ConverterConfig = z.infer<typeof converterConfigSchema>;

/** Caller-facing options, every option optional. */
export type ConverterOptions = z.input<typeof converterConfigSchema>;

/**
 * Applies defaults and validates caller options.
 *
 * @throws InvalidConfigError listing every rejected option
 */
export function resolveConfig(options: ConverterOptions = {}): ConverterConfig {
    const result = converterConfigSchema.safeParse(options);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new InvalidConfigError(details);
    }
    return result.data;
}
