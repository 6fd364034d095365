/**
 * @rewright/types - Type definitions for the conservative idiom migration engine
 */

// Facts, shapes, verdicts and reports
export * from './migration.js';

// Configuration and logging
export * from './config.js';
