export type { Row } from './frame.js';
export { RecordFrame, UnknownColumnError } from './frame.js';
export { ParamTable, PATH_COLUMN } from './param-table.js';
export type { OutputFormat } from './format.js';
export { OUTPUT_FORMATS, isOutputFormat, renderText, renderCsv, renderJson, renderTable } from './format.js';
