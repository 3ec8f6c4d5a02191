import {
  decodePayload,
  encodePayload,
  getMember,
  type PayloadObject,
  type PayloadValue,
} from './payload-json.js';
import { MISSING_REASON, type Rule, type TransformResult } from './types.js';

/**
 * Replaces every non-overlapping occurrence of `search` in `value`.
 * Returns null when `search` is empty or does not occur.
 */
export function replaceAllOccurrences(
  value: string,
  search: string,
  replacement: string,
): string | null {
  if (!search || !value.includes(search)) {
    return null;
  }
  // Function replacer so `$&`-style patterns in the replacement stay literal
  return value.replaceAll(search, () => replacement);
}

/**
 * Finds the first entry whose `name` equals the target exactly.
 * Later entries with the same name are never looked at.
 */
export function findTargetEntry(
  entries: readonly PayloadValue[],
  targetFieldName: string,
): PayloadObject | undefined {
  for (const entry of entries) {
    if (entry.kind !== 'object') continue;
    const name = getMember(entry, 'name')?.value;
    if (name?.kind === 'string' && name.value === targetFieldName) {
      return entry;
    }
  }
  return undefined;
}

/**
 * Applies the rule to one payload cell.
 *
 * The payload is a JSON array of `{ name, value, ... }` entries, or a single
 * such object. Once it parses, the cell is always re-encoded, even when no
 * value changed; a payload that fails to parse is returned untouched.
 * Re-encoding keeps member order and number text exactly as in the source.
 */
export function transformPayload(
  payloadText: string,
  rule: Pick<Rule, 'targetFieldName' | 'searchValue' | 'replaceValue'>,
): TransformResult {
  if (payloadText.trim() === '') {
    return {
      outcome: 'field-missing',
      outputText: payloadText,
      reason: MISSING_REASON.emptyPayload,
    };
  }

  const decoded = decodePayload(payloadText);
  if (!decoded.ok) {
    return {
      outcome: 'malformed-payload',
      outputText: payloadText,
      errorMessage: decoded.error,
    };
  }

  const entries =
    decoded.value.kind === 'array' ? decoded.value.items : [decoded.value];
  const encodeEntries = () => encodePayload({ kind: 'array', items: entries });
  const entry = findTargetEntry(entries, rule.targetFieldName);

  if (!entry) {
    return {
      outcome: 'field-missing',
      outputText: encodeEntries(),
      reason: MISSING_REASON.fieldNotFound,
    };
  }

  // A missing or non-string value can never contain the search text
  const valueMember = getMember(entry, 'value');
  const original =
    valueMember?.value.kind === 'string' ? valueMember.value.value : null;
  const newValue =
    original === null
      ? null
      : replaceAllOccurrences(original, rule.searchValue, rule.replaceValue);

  if (!valueMember || original === null || newValue === null) {
    return { outcome: 'unchanged', outputText: encodeEntries() };
  }

  valueMember.value = { kind: 'string', value: newValue };
  return {
    outcome: 'modified',
    outputText: encodeEntries(),
    originalValue: original,
    newValue,
  };
}
