/**
 * Error Types
 * Main export file for error classes
 */

export * from './app.errors';
export * from './upstream.errors';
