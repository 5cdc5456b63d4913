import type { Workbook } from 'exceljs';
import { renderValue, type DecodedField, type RecordLayout } from '@span-pa2/core';
import type { RecordEntry } from '../pipeline/types.js';
import { addRecordSheet, createWorkbook, fitColumns, LINE_COLUMN } from './utils.js';

/**
 * Builds one worksheet per record type, in first-seen order.
 * Columns are the source line number followed by the layout's fields.
 */
export function generateRecordsExcel(entries: readonly RecordEntry[], sourceFile: string): Workbook {
    const workbook = createWorkbook(sourceFile);
    const groups = new Map<string, { layout: RecordLayout; entries: RecordEntry[] }>();

    for (const entry of entries) {
        const { layout } = entry.record;
        const group = groups.get(layout.tag);
        if (group) {
            group.entries.push(entry);
        } else {
            groups.set(layout.tag, { layout, entries: [entry] });
        }
    }

    for (const { layout, entries: rows } of groups.values()) {
        const sheet = addRecordSheet(workbook, layout);

        for (const { lineNumber, record } of rows) {
            const row: Record<string, string | number | null> = { [LINE_COLUMN]: lineNumber };
            for (const field of record.fields()) {
                row[field.name] = toCellValue(field);
            }
            sheet.addRow(row);
        }

        fitColumns(sheet);
    }

    return workbook;
}

/**
 * Scalars go in as-is. NaN and null leave the cell empty, lists are rendered as text.
 */
export function toCellValue(field: DecodedField): string | number | null {
    switch (field.kind) {
        case 'string':
        case 'date':
        case 'time':
            return field.value;
        case 'string_group':
            return field.value.join(' ');
        case 'integer':
            return field.value;
        case 'scaled_float':
            return Number.isNaN(field.value) ? null : field.value;
        case 'tier_spans':
        case 'signed_magnitude_array':
            return renderValue(field);
    }
}
