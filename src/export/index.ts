/**
 * Export Module
 */

export { toCsv, toCsvRow, writeCsv, escapeCsvField } from './csv.js';
