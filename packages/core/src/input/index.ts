export { parseRequestWorkbook, type RequestParseResult } from './workbook.js';
export { validateRequestRows, type RequestValidationResult } from './validate.js';
export { extractCompanyCode } from './company-code.js';
