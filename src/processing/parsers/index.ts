export { parseCsv, validateCsvLine, netSale, type SaleRecord } from './csv.parser';
export { parseJson, extractErrorPosition } from './json.parser';
export { parseLog, matchLogLine } from './log.parser';
export { parseLeadingFloat, parseLeadingInt, roundTo, truncate } from './parsing-utils';
