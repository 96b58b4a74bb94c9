/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { extractCommand } from './extract.js';
export { transformCommand } from './transform.js';
export { loadCommand } from './load.js';
export { migrateCommand } from './migrate.js';
export { reportCommand } from './report.js';
export { validateCommand } from './validate.js';
