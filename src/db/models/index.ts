/**
 * Database Models Export
 */

export * from './disperse';
