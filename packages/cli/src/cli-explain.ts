/**
 * Error Explanation
 * Render registry documentation for `brewport --explain`
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from 'brewport';

/**
 * Documentation for one error ID, or null when the ID is malformed or
 * not registered.
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) return null;

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) return null;

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    `Category: ${definition.category}`,
  ];

  if (definition.cause) {
    sections.push(`Cause:\n  ${definition.cause}`);
  }
  if (definition.resolution) {
    sections.push(`Resolution:\n  ${definition.resolution}`);
  }
  if (definition.examples && definition.examples.length > 0) {
    const examples = definition.examples.map((example) => {
      const code = example.code
        .split('\n')
        .map((line) => `    ${line}`)
        .join('\n');
      return `  ${example.description}:\n${code}`;
    });
    sections.push(`Examples:\n${examples.join('\n\n')}`);
  }

  return sections.join('\n\n');
}
