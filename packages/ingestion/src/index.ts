export { CsvRecordSource, REQUIRED_COLUMNS, type CsvRecordSourceOptions, type RecordSourceStats } from './csv/csv-record-source.js';
export { InputReadError, MalformedRecordError } from './errors.js';
export {
  createTransactionRowSchema,
  parseTransactionRow,
  type TransactionRowSchema,
} from './schemas/transaction-row.schema.js';
