/**
 * Block Re-indentation
 *
 * Source bodies keep their interior layout relative to their closing
 * brace. The indentation before `}` (or, when `}` shares a line with code,
 * the smallest indentation of the interior) is replaced with the target
 * indentation.
 */

function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? '';
}

function commonIndent(lines: readonly string[]): string {
  let common: string | null = null;
  for (const line of lines) {
    if (line.trim() === '') continue;
    const indent = leadingWhitespace(line);
    if (common === null || indent.length < common.length) common = indent;
  }
  return common ?? '';
}

/**
 * Wrap block interior text in braces, re-indented so that the closing
 * brace lands at `target`.
 */
export function reindentBlock(interior: string, target: string): string {
  if (!interior.includes('\n')) return `{${interior}}`;

  const lines = interior.split('\n');
  const lastIndex = lines.length - 1;
  const closingOnOwnLine = (lines[lastIndex] ?? '').trim() === '';
  const base = closingOnOwnLine
    ? (lines[lastIndex] ?? '')
    : commonIndent(lines.slice(1));

  const out = lines.map((line, i) => {
    if (i === lastIndex && closingOnOwnLine) return target;
    if (line.trim() === '') return '';
    if (i === 0) return line;
    const rest = line.startsWith(base) ? line.slice(base.length) : line.trimStart();
    return target + rest;
  });

  return `{${out.join('\n')}}`;
}

/** Re-indent a doc comment to start at `target` */
export function reindentComment(comment: string, target: string): string {
  return comment
    .split('\n')
    .map((line, i) => {
      const trimmed = line.trimStart();
      if (i === 0) return target + trimmed;
      return trimmed.startsWith('*') ? `${target} ${trimmed}` : target + trimmed;
    })
    .join('\n');
}
