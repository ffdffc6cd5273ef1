import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { ArrayIdPartitions, Row, RowSequence } from '../dataset/Row';
import { valueToString } from '../dataset/values';
import { ArrayIdsExportInfoError, ArrayIdsInfoError } from '../errors';
import { getLogger } from '../logger';
import { filterMixedArrayData } from '../partition/arrayIds';
import type { ArrayIdsExportInfo, ExportOptions } from '../types/csv';

const log = getLogger('export');

/**
 * Render rows as CSV lines (without line terminators). Values holding the
 * delimiter, a quote or a line break are quoted.
 */
export function serializeRows(
  rows: RowSequence,
  options: Pick<ExportOptions, 'exportHeader' | 'includeTimeZone' | 'delimiter'> = {}
): string[] {
  const delimiter = options.delimiter || ',';
  const includeTimeZone = options.includeTimeZone === true;
  const lines: string[] = [];

  if (options.exportHeader && rows.length > 0) {
    lines.push(toLine(rows[0].keys().map(String), delimiter));
  }

  for (const row of rows) {
    lines.push(rowToLine(row, delimiter, includeTimeZone));
  }
  return lines;
}

function toLine(fields: string[], delimiter: string): string {
  return stringify([fields], { delimiter, eof: false });
}

function rowToLine(row: Row, delimiter: string, includeTimeZone: boolean): string {
  return toLine(
    row.values().map((value) => valueToString(value, includeTimeZone)),
    delimiter
  );
}

function hasContent(filePath: string): boolean {
  if (!fs.existsSync(filePath)) return false;
  return fs
    .readFileSync(filePath, { encoding: 'utf-8' })
    .split('\n')
    .some((line) => line.trim().length > 0);
}

/**
 * Write rows to a CSV file, creating its directory if needed.
 *
 * In append mode a header is only written when the file has no content yet,
 * so repeated exports to the same file keep a single header line. Overwrite
 * mode replaces the file, so its header is always written.
 */
export function exportToCsv(rows: RowSequence, outfilePath: string, options: ExportOptions = {}): void {
  const mode = options.mode || 'append';
  let exportHeader = options.exportHeader === true;

  fs.mkdirSync(path.dirname(outfilePath), { recursive: true });

  if (exportHeader && mode === 'append' && hasContent(outfilePath)) {
    exportHeader = false;
  }

  const lines = serializeRows(rows, { ...options, exportHeader });
  const output = lines.map((line) => line + '\n').join('');

  if (mode === 'overwrite') {
    fs.writeFileSync(outfilePath, output, { encoding: 'utf-8' });
  } else {
    fs.appendFileSync(outfilePath, output, { encoding: 'utf-8' });
  }

  log.debug(`Wrote ${rows.length} row(s) to ${outfilePath}`, { mode, exportHeader });
}

/**
 * Export array ID partitions, each to its own file.
 */
export function exportArrayIdsToCsv(
  data: RowSequence | ArrayIdPartitions,
  arrayIdsInfo: ArrayIdsExportInfo,
  options: ExportOptions = {}
): void {
  const arrayIds = Object.keys(arrayIdsInfo);
  if (arrayIds.length < 1) {
    throw new ArrayIdsInfoError('At least one array id must be given!');
  }

  const partitions = filterMixedArrayData(data, arrayIds);

  for (const [arrayId, arrayIdData] of partitions) {
    const exportInfo = arrayIdsInfo[arrayId];
    if (!exportInfo) {
      throw new ArrayIdsExportInfoError(arrayId, `No information was found for array id ${arrayId}`);
    }
    if (!exportInfo.filePath) {
      throw new ArrayIdsExportInfoError(arrayId, `No file path was found for array id ${arrayId}`);
    }
    exportToCsv(arrayIdData, exportInfo.filePath, options);
  }
}
