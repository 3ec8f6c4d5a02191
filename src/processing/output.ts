import type { Row } from './types.js';

/**
 * Builds the rows handed to the writer: the header followed by the
 * retained rows in the order they were encountered. An input without
 * even a header produces no rows.
 */
export function assembleOutput(
  header: Row | undefined,
  retainedRows: readonly Row[],
): Row[] {
  if (!header) {
    return [];
  }
  return [header, ...retainedRows];
}
