/**
 * Attribute grammar
 *
 * Decodes the compact annotation syntax attached to headings and fenced code
 * blocks, e.g. `{.run #greet mode=contains exp="Hi World"}`.
 *
 * - `.name` adds a class
 * - `#name` sets the id (at most once)
 * - `key=value` sets a value; the value is a bare token or a double-quoted string
 */

import { MalformedAttributesError } from '../errors.js';

/**
 * Decoded annotation
 */
export interface AttributeSet {
  /** Class tokens in source order, without the leading dot */
  classes: string[];
  /** Id token without the leading hash */
  id?: string;
  /** Raw key/value pairs; unknown keys are kept */
  values: Record<string, string>;
}

/**
 * Text split into its leading part and a trailing annotation
 */
export interface AnnotatedText {
  /** Everything before the annotation, trimmed */
  text: string;
  /** The annotation from its opening brace to the end, if any */
  annotation?: string;
}

const NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_:.-]*$/;
const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** Keys written as `data-mode=...` mean the same as `mode=...` */
const DATA_PREFIX = 'data-';

/**
 * Locate a trailing annotation in a heading or a fence info string.
 *
 * The annotation starts at the first `{` whose next non-space character is
 * `.` or `#`, so titles like "Using {braces}" are left alone.
 */
export function findAnnotation(input: string): AnnotatedText {
  for (let i = input.indexOf('{'); i !== -1; i = input.indexOf('{', i + 1)) {
    const next = input.slice(i + 1).trimStart()[0];
    if (next === '.' || next === '#') {
      return { text: input.slice(0, i).trim(), annotation: input.slice(i).trim() };
    }
  }
  return { text: input.trim() };
}

function isSpace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/**
 * Parse an annotation into an attribute set
 *
 * @throws MalformedAttributesError on an unterminated quote, a missing closing
 * brace, trailing text or a token that is not `.class`, `#id` or `key=value`
 */
export function parseAttributes(annotation: string): AttributeSet {
  const result: AttributeSet = { classes: [], values: {} };
  const length = annotation.length;
  let pos = 0;

  const skipSpace = () => {
    while (pos < length && isSpace(annotation[pos])) pos++;
  };
  const readToken = () => {
    const start = pos;
    while (pos < length && !isSpace(annotation[pos]) && annotation[pos] !== '}') pos++;
    return annotation.slice(start, pos);
  };

  skipSpace();
  if (annotation[pos] !== '{') {
    throw new MalformedAttributesError('Attributes must start with "{"', pos);
  }
  pos++;

  for (;;) {
    skipSpace();
    if (pos >= length) {
      throw new MalformedAttributesError('Missing closing "}"', pos);
    }

    const start = pos;
    const char = annotation[pos];

    if (char === '}') {
      pos++;
      break;
    }

    if (char === '.' || char === '#') {
      pos++;
      const name = readToken();
      if (!NAME_PATTERN.test(name)) {
        const what = char === '.' ? 'class' : 'id';
        throw new MalformedAttributesError(`Invalid ${what} "${char}${name}"`, start);
      }
      if (char === '.') {
        result.classes.push(name);
      } else if (result.id !== undefined) {
        throw new MalformedAttributesError(`Duplicate id "#${name}" (already "#${result.id}")`, start);
      } else {
        result.id = name;
      }
      continue;
    }

    // key=value
    while (pos < length && !isSpace(annotation[pos]) && !'}="'.includes(annotation[pos])) pos++;
    const key = annotation.slice(start, pos);
    if (annotation[pos] !== '=') {
      const token = key + readToken();
      throw new MalformedAttributesError(
        `Unexpected token "${token}"; expected .class, #id or key=value`,
        start
      );
    }
    if (!KEY_PATTERN.test(key)) {
      throw new MalformedAttributesError(
        key ? `Invalid attribute name "${key}"` : 'Missing attribute name before "="',
        start
      );
    }
    pos++;

    let value: string;
    if (annotation[pos] === '"') {
      value = readQuoted();
      if (pos < length && !isSpace(annotation[pos]) && annotation[pos] !== '}') {
        throw new MalformedAttributesError(`Unexpected text after quoted value of "${key}"`, pos);
      }
    } else {
      const valueStart = pos;
      value = readToken();
      if (value.includes('"')) {
        throw new MalformedAttributesError(`Unexpected quote in value of "${key}"`, valueStart);
      }
    }

    const name = key.startsWith(DATA_PREFIX) && key.length > DATA_PREFIX.length
      ? key.slice(DATA_PREFIX.length)
      : key;
    result.values[name] = value;
  }

  skipSpace();
  if (pos < length) {
    throw new MalformedAttributesError(
      `Unexpected text after closing "}": ${annotation.slice(pos)}`,
      pos
    );
  }

  return result;

  /**
   * Read a double-quoted string starting at `pos`. Supports \" \\ \n \t;
   * any other backslash is kept as written.
   */
  function readQuoted(): string {
    const quoteStart = pos;
    let value = '';
    pos++;
    while (pos < length) {
      const char = annotation[pos];
      if (char === '"') {
        pos++;
        return value;
      }
      if (char === '\\' && pos + 1 < length) {
        const escaped = annotation[pos + 1];
        if (escaped === '"' || escaped === '\\') {
          value += escaped;
        } else if (escaped === 'n') {
          value += '\n';
        } else if (escaped === 't') {
          value += '\t';
        } else {
          value += char + escaped;
        }
        pos += 2;
        continue;
      }
      value += char;
      pos++;
    }
    throw new MalformedAttributesError('Unterminated quoted value', quoteStart);
  }
}
