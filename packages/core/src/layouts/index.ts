/**
 * The shipped PA2 layout table.
 *
 * Validated against LayoutTableSchema when a registry is built from it.
 */

import layoutTable from './pa2-layouts.json' with { type: 'json' };

export const PA2_LAYOUT_TABLE: unknown = layoutTable;
