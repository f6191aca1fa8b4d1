/**
 * Error Explanation
 * Renders a registry definition for `textkit explain`
 */

import {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  type ErrorDefinition,
  type ErrorExample,
} from './error-registry.js';

const INDENT = '  ';

function indent(text: string, depth = 1): string[] {
  const prefix = INDENT.repeat(depth);
  return text.split('\n').map((line) => `${prefix}${line}`);
}

function exampleLines(example: ErrorExample): string[] {
  return [`${INDENT}${example.description}`, '', ...indent(example.code, 2)];
}

/** Heading block: ID, category, severity and the message shape */
function summaryLines(definition: ErrorDefinition): string[] {
  return [
    `${definition.errorId}: ${definition.description}`,
    `Category: ${definition.category} (${definition.severity ?? 'error'})`,
    `Message: ${definition.messageTemplate}`,
  ];
}

/**
 * Full documentation for an error ID, or null when the ID is malformed or
 * not registered.
 *
 * @example
 * explainError('TEXT-S001')
 * // TEXT-S001: String capacity exceeded
 * // Category: string (error)
 * // Message: Cannot grow string to {required} bytes (limit {maxCapacity})
 * // ...
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const blocks: string[][] = [summaryLines(definition)];
  if (definition.cause) {
    blocks.push(['Cause:', ...indent(definition.cause)]);
  }
  if (definition.resolution) {
    blocks.push(['Resolution:', ...indent(definition.resolution)]);
  }
  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    const lines = examples.flatMap((example, i) => [
      ...(i > 0 ? [''] : []),
      ...exampleLines(example),
    ]);
    blocks.push(['Examples:', ...lines]);
  }

  return blocks.map((block) => block.join('\n')).join('\n\n');
}
