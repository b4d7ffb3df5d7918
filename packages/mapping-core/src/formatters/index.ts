export { formatBatchReport } from './batch-formatter.js';
