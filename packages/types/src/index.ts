/**
 * @roster/types - Type definitions shared by the Roster packages
 */

export * from './records.js';
