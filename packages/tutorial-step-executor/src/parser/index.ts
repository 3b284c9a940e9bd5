/**
 * Markdown tutorial parser
 *
 * Turns an annotated Markdown document into a `Tutorial`. The document is
 * parsed with remark and walked in document order:
 *
 * - a heading annotated with `.step` opens a new step
 * - a fenced code block annotated with `.run` or `.file` becomes an action of
 *   the current step
 * - everything else is prose and has no effect
 *
 * Any malformed annotation rejects the whole document.
 */

import { readFile } from 'fs/promises';
import { remark } from 'remark';
import { visit } from 'unist-util-visit';
import { toString } from 'mdast-util-to-string';
import type { Code, Heading, Node } from 'mdast';
import type { Action, Step, Tutorial } from '../dsl/index.js';
import { FILE_CLASS, RUN_CLASS, STEP_CLASS } from '../dsl/schemas.js';
import { findAnnotation, parseAttributes } from '../attributes/index.js';
import type { AttributeSet } from '../attributes/index.js';
import { DocumentParseError, MalformedAttributesError } from '../errors.js';
import { buildFileAction, buildRunAction } from './actions.js';

export const UNTITLED_TUTORIAL = 'Untitled Tutorial';

type Block =
  | { type: 'heading'; node: Heading; next?: Node }
  | { type: 'code'; node: Code };

interface StepDraft {
  id: string;
  title: string;
  line: number;
  actions: Action[];
}

/**
 * Parse a tutorial from Markdown text
 *
 * @param source File path or URL the text came from, used in reports
 * @throws DocumentParseError when an annotation is malformed, an action appears
 * before the first step, or two steps share an id
 */
export function parseTutorial(markdown: string, source = '<string>'): Tutorial {
  const tree = remark().parse(markdown);

  const blocks: Block[] = [];
  visit(tree, (node, index, parent) => {
    if (node.type === 'heading') {
      const next = parent && index !== undefined ? parent.children[index + 1] : undefined;
      blocks.push({ type: 'heading', node, next });
    } else if (node.type === 'code') {
      blocks.push({ type: 'code', node });
    }
  });

  let title: string | undefined;
  const steps: StepDraft[] = [];
  const stepIds = new Set<string>();

  for (const block of blocks) {
    const line = block.node.position?.start.line ?? 0;

    if (block.type === 'heading') {
      const heading = splitHeading(block.node, block.next, markdown);
      const attrs = heading.annotation !== undefined
        ? decodeAnnotation(heading.annotation, line)
        : undefined;

      if (!attrs?.classes.includes(STEP_CLASS)) {
        if (title === undefined && block.node.depth === 1) {
          title = heading.text;
        }
        continue;
      }

      const id = attrs.id ?? `step-${steps.length + 1}`;
      if (stepIds.has(id)) {
        throw new DocumentParseError('duplicate-step-id', line, `Duplicate step id "${id}"`);
      }
      stepIds.add(id);
      steps.push({
        id,
        title: heading.text || `Step ${steps.length + 1}`,
        line,
        actions: [],
      });
      continue;
    }

    const info = fenceInfo(block.node, markdown);
    const fence = findAnnotation(info);
    if (fence.annotation === undefined) {
      continue;
    }

    const attrs = decodeAnnotation(fence.annotation, line);
    const isRun = attrs.classes.includes(RUN_CLASS);
    const isFile = attrs.classes.includes(FILE_CLASS);
    if (!isRun && !isFile) {
      continue;
    }
    if (isRun && isFile) {
      throw new DocumentParseError(
        'conflicting-markers',
        line,
        `Code block cannot be both .${RUN_CLASS} and .${FILE_CLASS}`
      );
    }

    const current = steps[steps.length - 1];
    if (!current) {
      throw new DocumentParseError(
        'orphan-action',
        line,
        `.${isRun ? RUN_CLASS : FILE_CLASS} code block appears before any .${STEP_CLASS} heading`
      );
    }

    const language = fence.text || undefined;
    current.actions.push(
      isRun
        ? buildRunAction(attrs, block.node.value, line, language)
        : buildFileAction(attrs, block.node.value, line, language)
    );
  }

  const frozenSteps: Step[] = steps.map((step) =>
    Object.freeze({ ...step, actions: Object.freeze([...step.actions]) })
  );

  return Object.freeze({
    title: title || UNTITLED_TUTORIAL,
    source,
    steps: Object.freeze(frozenSteps),
  });
}

/**
 * Read and parse a tutorial file
 */
export async function parseTutorialFile(filePath: string): Promise<Tutorial> {
  const markdown = await readFile(filePath, 'utf-8');
  return parseTutorial(markdown, filePath);
}

function decodeAnnotation(annotation: string, line: number): AttributeSet {
  try {
    return parseAttributes(annotation);
  } catch (error) {
    if (error instanceof MalformedAttributesError) {
      throw new DocumentParseError(
        'malformed-attributes',
        line,
        `Malformed attributes ${annotation}: ${error.message} (column ${error.column + 1})`
      );
    }
    throw error;
  }
}

/**
 * Heading text and annotation. The annotation is taken from the end of the
 * heading line or, failing that, from a paragraph made only of an annotation
 * on the line right below the heading.
 */
function splitHeading(
  heading: Heading,
  next: Node | undefined,
  markdown: string
): { text: string; annotation?: string } {
  const own = findAnnotation(rawHeadingText(heading, markdown));
  if (own.annotation !== undefined) {
    return own;
  }

  const headingEnd = heading.position?.end.line;
  if (next?.type === 'paragraph' && headingEnd !== undefined && next.position?.start.line === headingEnd + 1) {
    const below = findAnnotation(rawSource(next, markdown) ?? '');
    if (below.annotation !== undefined && below.text === '' && !below.annotation.includes('\n')) {
      return { text: own.text, annotation: below.annotation };
    }
  }
  return own;
}

/**
 * Heading text as written, so annotation values are not altered by inline
 * Markdown (emphasis, escapes).
 */
function rawHeadingText(heading: Heading, markdown: string): string {
  const raw = rawSource(heading, markdown);
  if (raw === undefined) {
    return toString(heading);
  }
  if (/^#{1,6}(?:[ \t]|$)/.test(raw)) {
    // ATX: drop the opening hashes and an optional closing sequence
    return raw.replace(/^#{1,6}/, '').replace(/(?:[ \t]+#+)?[ \t]*$/, '').trim();
  }
  // Setext: drop the underline
  const lines = raw.split('\n');
  lines.pop();
  return lines.map((line) => line.trim()).join(' ');
}

/**
 * Info string of a fenced code block as written. remark decodes backslash
 * escapes in `lang` and `meta`, which would change quoted values and regex
 * patterns, so the opening fence line is read from the source instead.
 * Indented code blocks have no info string.
 */
function fenceInfo(code: Code, markdown: string): string {
  const start = code.position?.start.offset;
  if (start === undefined) {
    return [code.lang, code.meta].filter(Boolean).join(' ');
  }
  const lineEnd = markdown.indexOf('\n', start);
  const openingLine = markdown.slice(start, lineEnd === -1 ? undefined : lineEnd);
  const fence = /^[ \t]*(?:`{3,}|~{3,})/.exec(openingLine);
  return fence ? openingLine.slice(fence[0].length).trim() : '';
}

function rawSource(node: Node, markdown: string): string | undefined {
  const start = node.position?.start.offset;
  const end = node.position?.end.offset;
  if (start === undefined || end === undefined) {
    return undefined;
  }
  return markdown.slice(start, end);
}

export { buildFileAction, buildRunAction } from './actions.js';
