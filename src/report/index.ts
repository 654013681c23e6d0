/**
 * Report model and exporters
 */

export { buildReport, TOOL_VERSION } from "./model";
export type { BuildReportOptions, ReportMetadata, ReportModel } from "./model";
export { toJsonDocument, toJsonReport } from "./json";
export type { JsonRankedRecord, JsonRecord, JsonReport, JsonReportOptions, JsonSummary } from "./json";
export {
  CSV_LIST_SEPARATOR,
  CSV_RECORD_COLUMNS,
  CsvReportWriter,
  looksLikeFormula,
  needsExcelQuoting,
  toCsvReport,
} from "./csv";
export type { CsvReportOptions } from "./csv";
