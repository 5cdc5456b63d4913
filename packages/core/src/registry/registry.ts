/**
 * Record registry: tag -> layout.
 *
 * Built once from a layout table and never mutated afterwards, so any number of
 * concurrent decoders can share it.
 */

import type { LayoutTable, RecordLayout, RecordLayoutInput } from '../types/index.js';
import { LayoutTableSchema } from '../types/index.js';
import { PA2_LAYOUT_TABLE } from '../layouts/index.js';

export class RecordRegistry {
    private readonly layouts: ReadonlyMap<string, RecordLayout>;

    private constructor(layouts: LayoutTable) {
        this.layouts = new Map(layouts.map((layout): [string, RecordLayout] => [layout.tag, deepFreeze(layout)]));
    }

    /**
     * Build a registry from raw layout definitions.
     *
     * @throws ZodError on duplicate tags, duplicate field names or broken ranges
     */
    static fromLayouts(layouts: readonly RecordLayoutInput[]): RecordRegistry {
        return RecordRegistry.parse(layouts);
    }

    /**
     * Build a registry from an unvalidated table, such as parsed JSON.
     */
    static parse(table: unknown): RecordRegistry {
        return new RecordRegistry(LayoutTableSchema.parse(table));
    }

    get(tag: string): RecordLayout | undefined {
        return this.layouts.get(tag);
    }

    has(tag: string): boolean {
        return this.layouts.has(tag);
    }

    /**
     * Registered tags in table order.
     */
    tags(): string[] {
        return [...this.layouts.keys()];
    }

    layoutList(): RecordLayout[] {
        return [...this.layouts.values()];
    }

    get size(): number {
        return this.layouts.size;
    }
}

function deepFreeze(layout: RecordLayout): RecordLayout {
    for (const field of layout.fields) {
        Object.freeze(field);
    }
    Object.freeze(layout.fields);
    return Object.freeze(layout);
}

/**
 * Registry of every record type in the shipped PA2 layout table.
 */
export const DEFAULT_REGISTRY = RecordRegistry.parse(PA2_LAYOUT_TABLE);

/**
 * Layout for a tag in the shipped table.
 */
export function getLayout(tag: string): RecordLayout | undefined {
    return DEFAULT_REGISTRY.get(tag);
}
