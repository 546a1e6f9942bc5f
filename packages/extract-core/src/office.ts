import ExcelJS from 'exceljs';
import mammoth from 'mammoth';

/** Raw text of a Word document, one non-empty paragraph per line. */
export async function extractDocxText(bytes: Uint8Array): Promise<string> {
  const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return value
    .split(/\n+/)
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .join('\n');
}

/**
 * Flattens every worksheet into lines of `cell | cell | cell`, one line per non-empty row.
 * Each sheet starts with its name so rows stay attributable.
 */
export async function extractSpreadsheetText(bytes: Uint8Array): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(Buffer.from(bytes));

  const sheetTexts: string[] = [];
  for (const worksheet of workbook.worksheets) {
    const rows: string[] = [];
    worksheet.eachRow({ includeEmpty: false }, (row) => {
      const cells: string[] = [];
      row.eachCell({ includeEmpty: false }, (cell) => {
        const text = cell.text.trim();
        if (text !== '') cells.push(text);
      });
      if (cells.length > 0) rows.push(cells.join(' | '));
    });
    if (rows.length > 0) {
      sheetTexts.push([worksheet.name, ...rows].join('\n'));
    }
  }
  return sheetTexts.join('\n\n');
}
