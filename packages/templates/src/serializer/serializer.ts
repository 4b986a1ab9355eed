/**
 * Serializer
 *
 * Writes expanded blocks back out as text: one space between tokens, none
 * before a joint token.
 */

import type { Token } from '../lexer/token.js';
import type { ExpandedBlock } from '../expander/expanded-nodes.js';

const SEPARATOR = ' ';

/**
 * Flatten expanded blocks into the token sequence they stand for
 */
export function flattenBlocks(blocks: readonly ExpandedBlock[]): Token[] {
  const tokens: Token[] = [];

  const visit = (block: ExpandedBlock): void => {
    for (const node of block.nodes) {
      if (node.kind === 'token') {
        tokens.push(node.token);
      } else {
        tokens.push(node.open);
        node.copies.forEach(visit);
        tokens.push(node.close);
      }
    }
  };

  blocks.forEach(visit);
  return tokens;
}

/**
 * Join tokens with the separator rule
 * Literal text (strings, chars) is written verbatim
 */
export function serializeTokens(tokens: readonly Token[]): string {
  let output = '';

  for (const token of tokens) {
    if (output !== '' && !token.joint) {
      output += SEPARATOR;
    }
    output += token.value;
  }

  return output;
}

export function serialize(blocks: readonly ExpandedBlock[]): string {
  return serializeTokens(flattenBlocks(blocks));
}
