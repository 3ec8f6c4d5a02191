import jsonc from 'jsonc-parser';
import type { Node, ParseError } from 'jsonc-parser';

/**
 * A decoded payload that re-encodes without loss: object members keep
 * their source order, and numbers and literals keep their source text.
 */
export type PayloadValue =
  | PayloadObject
  | { kind: 'array'; items: PayloadValue[] }
  | { kind: 'string'; value: string }
  | { kind: 'literal'; raw: string };

export type PayloadObject = { kind: 'object'; members: PayloadMember[] };

export type PayloadMember = { key: string; value: PayloadValue };

export type DecodeResult =
  | { ok: true; value: PayloadValue }
  | { ok: false; error: string };

function describeError(error: ParseError): string {
  return `${jsonc.printParseErrorCode(error.error)} at offset ${error.offset}`;
}

function fromNode(node: Node, text: string): PayloadValue {
  switch (node.type) {
    case 'object': {
      const members: PayloadMember[] = [];
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (!keyNode || !valueNode || typeof keyNode.value !== 'string') {
          continue;
        }
        const key = keyNode.value;
        const value = fromNode(valueNode, text);
        // Repeated key: last value wins, first position is kept
        const existing = members.find((m) => m.key === key);
        if (existing) {
          existing.value = value;
        } else {
          members.push({ key, value });
        }
      }
      return { kind: 'object', members };
    }
    case 'array':
      return {
        kind: 'array',
        items: (node.children ?? []).map((child) => fromNode(child, text)),
      };
    case 'string':
      return { kind: 'string', value: String(node.value) };
    default:
      return {
        kind: 'literal',
        raw: text.slice(node.offset, node.offset + node.length),
      };
  }
}

/**
 * Strict JSON decoding: no comments, no trailing commas, nothing after
 * the top-level value.
 */
export function decodePayload(text: string): DecodeResult {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(text, errors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false,
  });

  if (errors.length > 0) {
    return { ok: false, error: describeError(errors[0]) };
  }
  if (!root) {
    return { ok: false, error: 'ValueExpected at offset 0' };
  }
  return { ok: true, value: fromNode(root, text) };
}

/**
 * Compact encoding. Strings are escaped the way `JSON.stringify` does,
 * which leaves non-ASCII text as is.
 */
export function encodePayload(value: PayloadValue): string {
  switch (value.kind) {
    case 'object':
      return `{${value.members
        .map((m) => `${JSON.stringify(m.key)}:${encodePayload(m.value)}`)
        .join(',')}}`;
    case 'array':
      return `[${value.items.map(encodePayload).join(',')}]`;
    case 'string':
      return JSON.stringify(value.value);
    case 'literal':
      return value.raw;
  }
}

export function getMember(
  object: PayloadObject,
  key: string,
): PayloadMember | undefined {
  return object.members.find((m) => m.key === key);
}
