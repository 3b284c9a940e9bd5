import { z } from 'zod';
import { IDENTIFIER_PATTERN } from '../variables/store.js';

/** Heading class that opens a step */
export const STEP_CLASS = 'step';
/** Fence class for shell commands */
export const RUN_CLASS = 'run';
/** Fence class for file contents */
export const FILE_CLASS = 'file';

export const VALIDATION_MODES = ['exit', 'contains', 'regex', 'exact'] as const;
export const WRITE_MODES = ['write', 'append'] as const;
export const TEMPLATE_MODES = ['none', 'shell'] as const;

export const DEFAULT_TIMEOUT_SECONDS = 30;
/** Largest timeout a Node timer can hold (2^31 - 1 ms) */
export const MAX_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

// Attribute values are always strings; these schemas type and check them

const BooleanAttribute = z
  .enum(['true', 'false'], { error: 'must be "true" or "false"' })
  .transform((value) => value === 'true');

const TimeoutAttribute = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer number of seconds')
  .transform(Number)
  .refine((seconds) => seconds <= MAX_TIMEOUT_SECONDS, `must be at most ${MAX_TIMEOUT_SECONDS} seconds`);

const IdentifierAttribute = z
  .string()
  .regex(IDENTIFIER_PATTERN, 'must be a variable name (letters, digits, underscore; not starting with a digit)');

const PathAttribute = z.string({ error: 'is required' }).min(1, 'must not be empty');

// Run attributes
export const RunAttributesSchema = z
  .object({
    mode: z.enum(VALIDATION_MODES, { error: `must be one of ${VALIDATION_MODES.join(', ')}` }).default('exit'),
    exp: z.string().default('0'),
    timeout: TimeoutAttribute.default(DEFAULT_TIMEOUT_SECONDS),
    workdir: PathAttribute.optional(),
    'continue-on-error': BooleanAttribute.default(false),
    'out-var': IdentifierAttribute.optional(),
    'code-var': IdentifierAttribute.optional(),
    'out-file': PathAttribute.optional(),
  })
  .superRefine((attrs, ctx) => {
    if (attrs.mode === 'exit' && !/^-?\d+$/.test(attrs.exp.trim())) {
      ctx.addIssue({
        code: 'custom',
        path: ['exp'],
        input: attrs.exp,
        message: `must be an integer exit code when mode=exit, got "${attrs.exp}"`,
      });
    }
    if (attrs.mode === 'regex') {
      try {
        new RegExp(attrs.exp, 'm');
      } catch (error) {
        ctx.addIssue({
          code: 'custom',
          path: ['exp'],
          input: attrs.exp,
          message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    }
  });

// File attributes
export const FileAttributesSchema = z.object({
  path: PathAttribute,
  mode: z.enum(WRITE_MODES, { error: `must be one of ${WRITE_MODES.join(', ')}` }).default('write'),
  exec: BooleanAttribute.default(false),
  template: z.enum(TEMPLATE_MODES, { error: `must be one of ${TEMPLATE_MODES.join(', ')}` }).default('none'),
  once: BooleanAttribute.default(false),
  'continue-on-error': BooleanAttribute.default(false),
});

export type RunAttributes = z.infer<typeof RunAttributesSchema>;
export type FileAttributes = z.infer<typeof FileAttributesSchema>;

/**
 * One line per issue, e.g. `timeout: must be a non-negative integer number of seconds`
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.map(String).join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
