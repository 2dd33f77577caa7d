/**
 * Core types for boostsmith
 */

export * from './request.js';
export * from './install.js';
