import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  FileAttributesSchema,
  RunAttributesSchema,
  formatZodIssues,
} from '../../src/dsl/schemas.js';

describe('RunAttributesSchema', () => {
  it('should apply defaults', () => {
    const result = RunAttributesSchema.parse({});
    expect(result).toEqual({
      mode: 'exit',
      exp: '0',
      timeout: DEFAULT_TIMEOUT_SECONDS,
      'continue-on-error': false,
    });
  });

  it('should convert typed values', () => {
    const result = RunAttributesSchema.parse({
      mode: 'contains',
      exp: 'ready',
      timeout: '0',
      'continue-on-error': 'true',
      'out-var': 'OUT',
      'code-var': 'RC',
      'out-file': 'out.txt',
      workdir: 'app',
    });
    expect(result.timeout).toBe(0);
    expect(result['continue-on-error']).toBe(true);
    expect(result['out-var']).toBe('OUT');
    expect(result.workdir).toBe('app');
  });

  it('should drop unknown keys', () => {
    expect(RunAttributesSchema.parse({ note: 'x' })).not.toHaveProperty('note');
  });

  it('should reject an unknown mode', () => {
    const result = RunAttributesSchema.safeParse({ mode: 'fuzzy' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('mode: must be one of exit, contains, regex, exact');
    }
  });

  it('should reject a non-numeric timeout', () => {
    const result = RunAttributesSchema.safeParse({ timeout: '1.5' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('timeout: must be a non-negative integer number of seconds');
    }
  });

  it('should accept the longest timeout a timer can hold', () => {
    expect(MAX_TIMEOUT_SECONDS).toBe(2147483);
    expect(RunAttributesSchema.parse({ timeout: '2147483' }).timeout).toBe(2147483);
  });

  it.each(['2147484', '99999999999999999999'])('should reject timeout=%s', (timeout) => {
    const result = RunAttributesSchema.safeParse({ timeout });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('timeout: must be at most 2147483 seconds');
    }
  });

  it('should require an integer exp in exit mode', () => {
    const result = RunAttributesSchema.safeParse({ exp: 'ok' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('exp: must be an integer exit code when mode=exit, got "ok"');
    }
  });

  it('should accept a negative exit code', () => {
    expect(RunAttributesSchema.safeParse({ exp: '-1' }).success).toBe(true);
  });

  it('should reject a pattern that does not compile in regex mode', () => {
    const result = RunAttributesSchema.safeParse({ mode: 'regex', exp: '(' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['exp']);
      expect(result.error.issues[0].message.startsWith('invalid regular expression: ')).toBe(true);
    }
  });

  it('should reject invalid variable names', () => {
    expect(RunAttributesSchema.safeParse({ 'out-var': '9lives' }).success).toBe(false);
  });

  it('should reject booleans other than true and false', () => {
    const result = RunAttributesSchema.safeParse({ 'continue-on-error': 'yes' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('continue-on-error: must be "true" or "false"');
    }
  });
});

describe('FileAttributesSchema', () => {
  it('should require a path', () => {
    const result = FileAttributesSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('path: is required');
    }
  });

  it('should reject an empty path', () => {
    const result = FileAttributesSchema.safeParse({ path: '' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe('path: must not be empty');
    }
  });

  it('should apply defaults', () => {
    expect(FileAttributesSchema.parse({ path: 'a.txt' })).toEqual({
      path: 'a.txt',
      mode: 'write',
      exec: false,
      template: 'none',
      once: false,
      'continue-on-error': false,
    });
  });

  it('should parse all options', () => {
    const result = FileAttributesSchema.parse({
      path: 'bin/run.sh',
      mode: 'append',
      exec: 'true',
      template: 'shell',
      once: 'true',
    });
    expect(result.mode).toBe('append');
    expect(result.exec).toBe(true);
    expect(result.template).toBe('shell');
    expect(result.once).toBe(true);
  });

  it('should reject an unknown write mode', () => {
    expect(FileAttributesSchema.safeParse({ path: 'a', mode: 'overwrite' }).success).toBe(false);
  });
});

describe('formatZodIssues', () => {
  it('should join several issues', () => {
    const result = FileAttributesSchema.safeParse({ path: 'a', exec: 'maybe', once: 'sometimes' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toBe(
        'exec: must be "true" or "false"; once: must be "true" or "false"'
      );
    }
  });
});
