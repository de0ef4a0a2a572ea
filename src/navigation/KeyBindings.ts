/**
 * Single-key navigation table
 *
 * Maps host gestures (`h`, `shift+h`, `control+alt+leftArrow`...) to
 * navigation requests and the messages a host announces with them.
 *
 * @since 2026-10-16
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { KeyBindingsError, isElementCategory } from '../base/index.js';
import type { ElementCategory } from '../base/index.js';
import type { NavigationRequest, NavigationResult } from './types.js';

const DEFAULT_BINDINGS_PATH = fileURLToPath(new URL('../../data/key-bindings.json', import.meta.url));

const CategorySchema = z.string().refine(isElementCategory, { message: 'Unknown element category' });
const DirectionSchema = z.enum(['next', 'previous']);

const RequestSchema = z.union([
  z.object({
    kind: z.literal('categoryJump'),
    category: CategorySchema,
    direction: DirectionSchema,
    level: z.number().int().min(1).max(6).optional(),
  }),
  z.object({
    kind: z.literal('categoryJump'),
    categories: z.array(CategorySchema).min(1),
    direction: DirectionSchema,
  }),
  z.object({
    kind: z.literal('blockBoundary'),
    edge: z.enum(['start', 'end']),
  }),
  z.object({
    kind: z.literal('cellMove'),
    direction: z.enum(['left', 'right', 'up', 'down']),
  }),
]);

const KeyBindingSchema = z.object({
  gesture: z.string().min(1),
  name: z.string().min(1),
  request: RequestSchema,
  notFound: z.string().min(1),
});

const KeyBindingsFileSchema = z.object({
  version: z.literal(1),
  bindings: z.array(KeyBindingSchema),
});

export type KeyBinding = z.infer<typeof KeyBindingSchema>;

const CATEGORY_NAMES: Record<ElementCategory, string> = {
  heading: 'heading',
  table: 'table',
  list: 'list',
  listItem: 'list item',
  blockquote: 'block quote',
  codeBlock: 'code',
  separator: 'separator',
  checkbox: 'check box',
  inlineCode: 'code',
  link: 'link',
  image: 'graphic',
  bold: 'bold',
  emphasis: 'italic',
  strikethrough: 'strikethrough',
  footnote: 'footnote',
  math: 'math formula',
};

/**
 * Load and validate a key table (defaults to the bundled one)
 */
export function loadKeyBindings(path: string = DEFAULT_BINDINGS_PATH): KeyBinding[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new KeyBindingsError(`Cannot read key bindings from ${path}`, error);
  }

  const parsed = KeyBindingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new KeyBindingsError(`Invalid key bindings in ${path}`, parsed.error.issues);
  }

  const seen = new Set<string>();
  for (const binding of parsed.data.bindings) {
    const gesture = normalizeGesture(binding.gesture);
    if (seen.has(gesture)) {
      throw new KeyBindingsError(`Duplicate gesture "${binding.gesture}" in ${path}`);
    }
    seen.add(gesture);
  }

  return parsed.data.bindings;
}

/**
 * Lowercase, modifiers sorted: `Shift+H` and `shift+h` are the same gesture
 */
export function normalizeGesture(gesture: string): string {
  const parts = gesture.split('+').map(part => part.trim().toLowerCase());
  const key = parts.pop() ?? '';
  return [...parts.sort(), key].join('+');
}

export function findBinding(bindings: readonly KeyBinding[], gesture: string): KeyBinding | undefined {
  const wanted = normalizeGesture(gesture);
  return bindings.find(binding => normalizeGesture(binding.gesture) === wanted);
}

function requestKey(request: NavigationRequest): string {
  switch (request.kind) {
    case 'blockBoundary':
      return `blockBoundary:${request.edge}`;
    case 'cellMove':
      return `cellMove:${request.direction}`;
    case 'categoryJump':
      if ('categories' in request) {
        return `categoryJump:${request.direction}:${[...request.categories].sort().join(',')}`;
      }
      return `categoryJump:${request.direction}:${request.category}:${request.level ?? ''}`;
  }
}

/**
 * Message for a request that found nothing ("no next heading")
 */
export function describeNoMatch(request: NavigationRequest, bindings: readonly KeyBinding[] = []): string {
  const key = requestKey(request);
  const binding = bindings.find(candidate => requestKey(candidate.request) === key);
  if (binding) return binding.notFound;

  switch (request.kind) {
    case 'blockBoundary':
      return 'Not inside a block';
    case 'cellMove':
      return 'Edge of table';
    case 'categoryJump': {
      const direction = request.direction;
      if ('categories' in request) {
        const name = request.categories.length > 0 ? CATEGORY_NAMES[request.categories[0]] : 'element';
        return `no ${direction} ${name}`;
      }
      if (request.category === 'heading' && request.level !== undefined) {
        return `No ${direction} heading at level ${request.level}`;
      }
      return `no ${direction} ${CATEGORY_NAMES[request.category]}`;
    }
  }
}

/**
 * Text a host can announce after a successful move
 */
export function describeTarget(result: NavigationResult): string {
  if (!result.found) return '';

  if (result.cell) {
    return result.cell.text === '' ? 'blank' : result.cell.text;
  }

  const element = result.element;
  if (!element) return '';

  const metadata = element.metadata;
  if (!metadata) return CATEGORY_NAMES[element.category];

  switch (metadata.kind) {
    case 'heading':
      return `${metadata.text}, heading level ${element.level ?? 1}`;
    case 'link':
      return `${metadata.text}, link`;
    case 'image':
      return metadata.alt === '' ? 'graphic' : `${metadata.alt}, graphic`;
    case 'checkbox':
      return metadata.checked ? 'check box, checked' : 'check box, not checked';
    case 'footnote':
      return `footnote ${metadata.label}`;
    case 'codeBlock':
      return metadata.language ? `${metadata.language} code` : 'code';
    case 'list':
      return `${metadata.ordered ? 'numbered list' : 'list'} with ${metadata.itemCount} items`;
    case 'table':
      return `table with ${metadata.rowCount} rows and ${metadata.columnCount} columns`;
    default:
      return CATEGORY_NAMES[element.category];
  }
}
