/**
 * Zod schemas for the values callers hand to the engine from outside:
 * delimiter configuration and hook tag characters.
 */
import { z } from 'zod';

// One code point that is neither a word character nor whitespace.
export const TAG_CHAR_CLASS = '[^\\p{L}\\p{M}\\p{N}\\p{Pc}\\s]';

export const TagCharSchema = z
  .string()
  .regex(new RegExp(`^${TAG_CHAR_CLASS}$`, 'u'), {
    message: 'Tag must be a single non-word, non-whitespace character',
  });

export const DelimiterPairSchema = z.object({
  left: z.string().min(1, 'Left delimiter must not be empty'),
  right: z.string().min(1, 'Right delimiter must not be empty'),
});
export type DelimiterPair = z.infer<typeof DelimiterPairSchema>;

/** Parses a `name=value` command-line variable assignment. */
export const VariableAssignmentSchema = z
  .string()
  .regex(/^[^=]+=/, { message: 'Expected name=value' })
  .transform((s) => {
    const eq = s.indexOf('=');
    return { name: s.slice(0, eq), value: s.slice(eq + 1) };
  });
