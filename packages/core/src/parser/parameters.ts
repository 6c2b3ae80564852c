/**
 * Formal Parameter Lists
 */

import type { ParameterNode, TypeRefNode } from '../ast-nodes.js';
import type { TokenGroup } from '../token-types.js';
import { TokenInputStream } from '../stream/token-stream.js';
import type { ParseContext } from './context.js';
import {
  isIdentifier,
  isKeyword,
  isPunct,
  skipDimensions,
  spanFrom,
} from './helpers.js';
import { malformed, parseModifiers, parseTypeRef } from './type-parsing.js';

const CONSTRUCT = 'parameter list';

function withExtraDimensions(type: TypeRefNode, extra: number): TypeRefNode {
  return extra === 0 ? type : { ...type, dimensions: type.dimensions + extra };
}

/**
 * Parse the interior of a round group as formal parameters.
 * A receiver parameter (`Outer this`) is accepted and dropped.
 *
 * @throws ParseError on malformed parameters
 */
export function parseParameters(
  group: TokenGroup,
  ctx: ParseContext
): ParameterNode[] {
  const stream = TokenInputStream.over(group);
  const params: ParameterNode[] = [];

  for (;;) {
    const first = stream.current();
    if (first === undefined) return params;

    const { modifiers, annotations } = parseModifiers(stream, ctx);
    const paramType = parseTypeRef(stream, ctx, CONSTRUCT, group);

    let isVarArgs = false;
    if (isPunct(stream.current(), '...')) {
      stream.advance();
      isVarArgs = true;
    }

    const nameToken = stream.current();
    if (isKeyword(nameToken, 'this')) {
      stream.advance();
    } else if (isIdentifier(nameToken)) {
      stream.advance();
      const extra = skipDimensions(stream);
      params.push({
        type: 'Parameter',
        name: nameToken.text,
        paramType: withExtraDimensions(paramType, extra),
        modifiers,
        annotations,
        isVarArgs,
        span: spanFrom(first, stream),
      });
    } else {
      throw malformed(stream, ctx, CONSTRUCT, 'parameter name', group);
    }

    if (!stream.hasNext()) return params;
    if (!isPunct(stream.current(), ',')) {
      throw malformed(stream, ctx, CONSTRUCT, "',' or ')'", group);
    }
    stream.advance();
    if (!stream.hasNext()) {
      throw malformed(stream, ctx, CONSTRUCT, 'parameter', group);
    }
  }
}
