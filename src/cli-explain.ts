/**
 * CLI Error Explanation
 *
 * `--explain PIPE-R003` prints one registry entry; `--explain runtime`
 * lists every id in that category.
 */

import {
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
} from './types.js';

const CATEGORY_LABELS: Record<ErrorCategory, string> = {
  lexer: 'lexer (raised while reading characters)',
  parse: 'parse (raised before any statement runs)',
  runtime: 'runtime (raised while a statement runs)',
  config: 'config (raised while loading .pipeshrc.yaml)',
};

function isCategory(name: string): name is ErrorCategory {
  return Object.hasOwn(CATEGORY_LABELS, name);
}

function indented(text: string, prefix: string): string[] {
  return text.split('\n').map((line) => prefix + line);
}

function renderEntry(definition: ErrorDefinition): string {
  const lines = [
    `${definition.errorId}  ${definition.description}`,
    `Category: ${CATEGORY_LABELS[definition.category]}`,
    `Message:  ${definition.messageTemplate}`,
  ];
  if (definition.cause) {
    lines.push('', 'Why it happens', ...indented(definition.cause, '  '));
  }
  if (definition.resolution) {
    lines.push('', 'How to fix it', ...indented(definition.resolution, '  '));
  }
  for (const example of definition.examples ?? []) {
    lines.push('', `Example (${example.description}):`);
    lines.push(...indented(example.code, '  > '));
  }
  return lines.join('\n');
}

function renderCategory(category: ErrorCategory): string {
  const lines = [`${CATEGORY_LABELS[category]}:`];
  for (const [id, definition] of ERROR_REGISTRY.entries()) {
    if (definition.category === category) {
      lines.push(`  ${id}  ${definition.description}`);
    }
  }
  return lines.join('\n');
}

/**
 * Documentation for an error id or a category name, both matched
 * case-insensitively.
 *
 * @returns null when the query names neither
 */
export function explainError(query: string): string | null {
  const key = query.trim();
  const category = key.toLowerCase();
  if (isCategory(category)) return renderCategory(category);

  const definition = ERROR_REGISTRY.get(key);
  return definition ? renderEntry(definition) : null;
}
