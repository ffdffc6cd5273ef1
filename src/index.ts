export { DataloggerParser, createDataloggerParser } from './devices/DataloggerParser';
export type { ReadTableTimeOptions } from './devices/DataloggerParser';
export {
  DEFAULT_TIME_ZONE,
  DEVICE_MODELS,
  DEVICE_PROFILES,
  DataloggerParserOptionsSchema,
  getDeviceProfile,
  parseDataloggerParserOptions,
} from './config/devices';
export type { DataloggerParserOptions } from './config/devices';
export { Row } from './dataset/Row';
export type { ArrayIdPartitions, RowSequence } from './dataset/Row';
export { formatTimestamp, valueToString } from './dataset/values';
export * from './errors';
export { getLogger } from './logger';
export {
  fixFloat,
  parseMixedArrayRows,
  parseTableRows,
  readArrayIdsData,
  readMixedArrayData,
  readTableData,
} from './parsers/csvParser';
export { resolveTimeFormat } from './parsers/formatLibrary';
export { HOUR_MINUTE_FORMAT, HOUR_MINUTE_TOKEN, decodeHourMinute, expandHourMinute } from './parsers/hourMinute';
export type { HourMinuteStyle } from './parsers/hourMinute';
export { strptime, translateFormat } from './parsers/strptime';
export type { TranslatedFormat } from './parsers/strptime';
export { localize, parseTimeString, parseTimeValues, resolveTimeZone } from './parsers/timeParser';
export { filterMixedArrayData, renameArrayIds } from './partition/arrayIds';
export { convertTimeZone, extractColumnsData, updateColumnNames } from './transform/columns';
export type { UpdateColumnNamesOptions } from './transform/columns';
export { convertRowTime, convertTime, convertTimeCollectingErrors, findInsertionKey } from './transform/convertTime';
export { exportArrayIdsToCsv, exportToCsv, serializeRows } from './writers/csvWriter';
export type * from './types/csv';
export type * from './types/row';
export type * from './types/time';
