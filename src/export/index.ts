export type {
  ExportFormat,
  WriterSummary,
  StreamWriter,
  EnvelopeMetadata,
  JsonEnvelope,
} from './types.js';
export { BaseStreamWriter, type StreamWriterOptions } from './stream-writer.js';
export { CsvStreamWriter } from './csv-writer.js';
export { JsonStreamWriter, type JsonStreamWriterOptions } from './json-writer.js';
export { formatCsvValue, formatCsvLine, expandStructuredValue } from './values.js';
export {
  normalizeName,
  sanitizeJobName,
  formatRunTimestamp,
  buildOutputDirectory,
  tempPathFor,
} from './paths.js';
