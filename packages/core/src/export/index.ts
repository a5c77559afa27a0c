export {
    LineItemExporter,
    exportLineItems,
    EXPORT_ENCODING_UTF8,
    type ExportFileAccess,
    type ExportResult,
    type LineItemExportRequest,
} from './line-item-exporter.js';
