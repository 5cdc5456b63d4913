import exceljs from 'exceljs';
import type { Fill, Font, Workbook, Worksheet } from 'exceljs';
import { CLI_DEFAULTS } from '@span-pa2/shared';
import type { RecordLayout } from '@span-pa2/core';

export const LINE_COLUMN = 'line';

const HEADER_FONT: Partial<Font> = { name: 'Consolas', bold: true, size: 10 };
const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFE7E6E6' } };

const COLUMN_WIDTH = { min: 6, max: 60 } as const;

/**
 * Empty workbook stamped with the decoded file's name.
 */
export function createWorkbook(sourceFile: string): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = `span-pa2 ${CLI_DEFAULTS.VERSION}`;
    workbook.title = sourceFile;
    workbook.subject = 'Decoded PA2 records';
    workbook.created = new Date();
    return workbook;
}

/**
 * Worksheet for one record type: the line number, then one column per layout field.
 * The header row and the line column stay in view while scrolling.
 */
export function addRecordSheet(workbook: Workbook, layout: RecordLayout): Worksheet {
    const sheet = workbook.addWorksheet(layout.name);
    sheet.views = [{ state: 'frozen', xSplit: 1, ySplit: 1 }];
    sheet.columns = [LINE_COLUMN, ...layout.fields.map(field => field.name)].map(name => ({ header: name, key: name }));

    const header = sheet.getRow(1);
    header.font = HEADER_FONT;
    header.fill = HEADER_FILL;
    return sheet;
}

/**
 * Sizes each column to its longest cell text, header included.
 */
export function fitColumns(sheet: Worksheet): void {
    for (const column of sheet.columns) {
        let longest = 0;
        column.eachCell?.({ includeEmpty: false }, cell => {
            longest = Math.max(longest, cell.text.length);
        });
        column.width = Math.min(Math.max(longest + 1, COLUMN_WIDTH.min), COLUMN_WIDTH.max);
    }
}
