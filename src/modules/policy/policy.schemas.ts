/**
 * src/modules/policy/policy.schemas.ts
 *
 * WHY:
 * - Policy values arrive as JS values (mappings) or as strings (ini text, env vars).
 * - One set of Zod schemas turns both into typed values.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Numbers may be given as numeric strings ("8000").
 * - vary_rounds: a number or "N" is absolute; "N%" is a percentage (0-100).
 * - Scheme lists may be a comma-separated string or an array of names / handler objects.
 */

import { z } from 'zod';
import { isPasswordHandler, type PasswordHandler } from '../handlers/handler.types';
import type { PolicyOptionName } from './policy.types';

const SCHEME_NAME_PATTERN = /^[a-z0-9_]+$/;

export const integerOptionSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a non-negative integer')])
  .pipe(z.coerce.number().int('Expected an integer').nonnegative('Expected a non-negative integer'));

export const varyRoundsSchema = z.union([
  z
    .number()
    .nonnegative()
    .transform((value) => ({ kind: 'absolute' as const, value })),
  z
    .string()
    .trim()
    .regex(/^\d+(?:\.\d+)?%$/, 'Expected a number or a percentage such as "10%"')
    .transform((text) => ({ kind: 'percent' as const, value: Number(text.slice(0, -1)) }))
    .refine((vary) => vary.value <= 100, 'Percentage must not exceed 100%'),
  z
    .string()
    .trim()
    .regex(/^\d+$/)
    .transform((text) => ({ kind: 'absolute' as const, value: Number(text) })),
]);

export const OPTION_SCHEMAS = {
  salt_size: integerOptionSchema,
  rounds: integerOptionSchema,
  default_rounds: integerOptionSchema,
  min_rounds: integerOptionSchema,
  max_rounds: integerOptionSchema,
  vary_rounds: varyRoundsSchema,
} satisfies Record<PolicyOptionName, z.ZodTypeAny>;

export const schemeNameSchema = z
  .string()
  .trim()
  .regex(SCHEME_NAME_PATTERN, 'Scheme names must match [a-z0-9_]+');

const handlerSchema = z.custom<PasswordHandler>(isPasswordHandler, 'Expected a password handler');

export const schemeRefSchema = z.union([schemeNameSchema, handlerSchema]);

function splitList(text: string): string[] {
  return text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export const schemeListSchema = z.union([
  z.string().transform(splitList).pipe(z.array(schemeNameSchema)),
  z.array(schemeRefSchema),
]);
