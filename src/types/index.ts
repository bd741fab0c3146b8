/**
 * Core type definitions for the toolkit.
 * Provides the Result type for error handling.
 */

export * from './core';
