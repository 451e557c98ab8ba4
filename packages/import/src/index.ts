export { CsvParser, type CsvRow } from './csv/csv-parser.js';
export { decodeTransactions, parseTransactionsCsv, readTransactions } from './csv/transaction-csv-reader.js';
