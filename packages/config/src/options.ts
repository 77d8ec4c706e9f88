/**
 * Codec Options
 *
 * Separator symbols and XML tag names used by a ConfigCodec instance.
 */

import { z } from 'zod';
import { ValidationError } from '@aligner/core';

const symbol = z
  .string()
  .min(1)
  .refine((value) => !/[\r\n]/.test(value), 'must not contain a line break');

const codecOptionsSchema = z
  .object({
    pairSeparator: symbol.default('|'),
    assignmentSymbol: symbol.default('='),
    tasksTag: z.string().min(1).default('tasks'),
    taskTag: z.string().min(1).default('task'),
  })
  .refine(
    (options) =>
      !options.pairSeparator.includes(options.assignmentSymbol) &&
      !options.assignmentSymbol.includes(options.pairSeparator),
    {
      message: 'must not overlap with pairSeparator',
      path: ['assignmentSymbol'],
    }
  );

export type CodecOptions = z.output<typeof codecOptionsSchema>;
export type CodecOptionsInput = z.input<typeof codecOptionsSchema>;

/**
 * Fill in defaults and validate, throwing ValidationError on the first bad field
 */
export function resolveCodecOptions(input: CodecOptionsInput = {}): CodecOptions {
  const parsed = codecOptionsSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'options',
      issue?.message ?? 'invalid codec options'
    );
  }

  return parsed.data;
}

export const DEFAULT_CODEC_OPTIONS: Readonly<CodecOptions> = Object.freeze(resolveCodecOptions());
